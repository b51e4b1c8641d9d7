import { DataSource } from 'typeorm';
import { createDataSource, MEMORY_DATABASE } from '@/db/dataSource';
import { User } from '@/db/entities/User';
import { CityService } from '@/modules/cities';

describe('CityService (unit)', () => {
  let dataSource: DataSource;
  let cities: CityService;
  let ana: User;
  let bo: User;

  beforeEach(async () => {
    dataSource = createDataSource(MEMORY_DATABASE);
    await dataSource.initialize();
    cities = new CityService(dataSource);

    const repo = dataSource.getRepository(User);
    ana = await repo.save(
      repo.create({ username: 'Ana', email: 'ana@example.com', password: null, subject: null })
    );
    bo = await repo.save(
      repo.create({ username: 'Bo', email: 'bo@example.com', password: null, subject: null })
    );
  });

  afterEach(async () => {
    await dataSource.destroy();
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - cities are listed in the order they were added
   */
  it('adds cities and lists them in insertion order', async () => {
    await expect(cities.addCity(ana.id, 2267057)).resolves.toBe('added');
    await expect(cities.addCity(ana.id, 2643743)).resolves.toBe('added');

    await expect(cities.listCityIds(ana.id)).resolves.toEqual([2267057, 2643743]);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - a (user, city) pair is stored once
   */
  it('reports an existing subscription instead of duplicating it', async () => {
    await cities.addCity(ana.id, 2267057);

    await expect(cities.addCity(ana.id, 2267057)).resolves.toBe('exists');
    await expect(cities.listCityIds(ana.id)).resolves.toEqual([2267057]);
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - a double-submitted form adds the city once and reports the other as existing
   */
  it('settles concurrent adds of the same city', async () => {
    const outcomes = await Promise.all([
      cities.addCity(ana.id, 2267057),
      cities.addCity(ana.id, 2267057),
    ]);

    expect([...outcomes].sort()).toEqual(['added', 'exists']);
    await expect(cities.listCityIds(ana.id)).resolves.toEqual([2267057]);
  });

  it('keeps each user list separate', async () => {
    await cities.addCity(ana.id, 2267057);
    await cities.addCity(bo.id, 2267057);
    await cities.addCity(bo.id, 3117735);

    await expect(cities.listCityIds(ana.id)).resolves.toEqual([2267057]);
    await expect(cities.listCityIds(bo.id)).resolves.toEqual([2267057, 3117735]);
  });

  /**
   * Purpose:
   * Verifies Core behavior:
   * - only the owner's subscription is removed
   */
  it('removes a city only from its owner', async () => {
    await cities.addCity(ana.id, 2267057);
    await cities.addCity(bo.id, 2267057);

    await expect(cities.removeCity(ana.id, 2267057)).resolves.toBe(true);
    await expect(cities.removeCity(ana.id, 2267057)).resolves.toBe(false);
    await expect(cities.removeCity(ana.id, 3117735)).resolves.toBe(false);

    await expect(cities.listCityIds(ana.id)).resolves.toEqual([]);
    await expect(cities.listCityIds(bo.id)).resolves.toEqual([2267057]);
  });
});
