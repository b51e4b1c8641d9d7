import { DataSource, Repository } from 'typeorm';
import { UserCity } from '../db/entities/UserCity';
import { isUniqueViolation } from '../db/errors';

export type AddCityOutcome = 'added' | 'exists';

/** A user's list of followed cities. */
export class CityService {
  private readonly cities: Repository<UserCity>;

  constructor(dataSource: DataSource) {
    this.cities = dataSource.getRepository(UserCity);
  }

  async listCityIds(userId: number): Promise<number[]> {
    const rows = await this.cities.find({
      where: { userId },
      order: { id: 'ASC' },
    });
    return rows.map((row) => row.cityId);
  }

  async addCity(userId: number, cityId: number): Promise<AddCityOutcome> {
    if (await this.cities.existsBy({ userId, cityId })) {
      return 'exists';
    }

    try {
      await this.cities.save(this.cities.create({ userId, cityId }));
    } catch (err) {
      // A concurrent submit inserted the same pair first
      if (isUniqueViolation(err)) return 'exists';
      throw err;
    }
    return 'added';
  }

  /** Returns false when the user does not follow the city. */
  async removeCity(userId: number, cityId: number): Promise<boolean> {
    const subscription = await this.cities.findOneBy({ userId, cityId });
    if (!subscription) {
      return false;
    }

    await this.cities.remove(subscription);
    return true;
  }
}
