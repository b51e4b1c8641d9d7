import 'reflect-metadata';
import { Column, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { UserCity } from './UserCity';

@Entity('users')
export class User {
  @PrimaryGeneratedColumn({ type: 'integer' })
  id!: number;

  @Column({ type: 'varchar', length: 250 })
  username!: string;

  @Column({ type: 'varchar', length: 250, unique: true })
  email!: string;

  // Null for accounts created through the identity provider
  @Column({ type: 'varchar', length: 250, nullable: true })
  password!: string | null;

  // Identity provider subject
  @Column({ type: 'varchar', length: 250, nullable: true, unique: true })
  subject!: string | null;

  @OneToMany(() => UserCity, (city) => city.user)
  cities!: UserCity[];
}
