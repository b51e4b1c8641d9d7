import 'reflect-metadata';
import { Column, Entity, Index, JoinColumn, ManyToOne, PrimaryGeneratedColumn } from 'typeorm';
import { User } from './User';

@Entity('user_cities')
@Index(['userId', 'cityId'], { unique: true })
export class UserCity {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  /** OpenWeatherMap city id */
  @Column({ type: 'integer' })
  cityId!: number;

  @Column({ type: 'integer' })
  userId!: number;

  @ManyToOne(() => User, (user) => user.cities, { onDelete: 'CASCADE' })
  @JoinColumn({ name: 'userId' })
  user!: User;
}
