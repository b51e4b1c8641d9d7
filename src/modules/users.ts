import bcrypt from 'bcryptjs';
import { DataSource, Repository } from 'typeorm';
import { User } from '../db/entities/User';
import { isUniqueViolation } from '../db/errors';
import { Identity } from '../interfaces/identity';
import { logger } from '../logger';

const SALT_ROUNDS = 10;

export interface NewUser {
  username: string;
  email: string;
  password: string;
}

function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export class UserService {
  private readonly users: Repository<User>;

  constructor(dataSource: DataSource) {
    this.users = dataSource.getRepository(User);
  }

  findById(id: number): Promise<User | null> {
    return this.users.findOneBy({ id });
  }

  findByEmail(email: string): Promise<User | null> {
    return this.users.findOneBy({ email: normalizeEmail(email) });
  }

  /** Returns null when the email is already registered. */
  async register(input: NewUser): Promise<User | null> {
    const email = normalizeEmail(input.email);

    if (await this.users.existsBy({ email })) {
      return null;
    }

    const user = this.users.create({
      username: input.username.trim(),
      email,
      password: await bcrypt.hash(input.password, SALT_ROUNDS),
      subject: null,
    });

    let saved: User;
    try {
      saved = await this.users.save(user);
    } catch (err) {
      if (isUniqueViolation(err)) return null;
      throw err;
    }

    logger.info({ userId: saved.id }, 'User registered');
    return saved;
  }

  async authenticate(email: string, password: string): Promise<User | null> {
    const user = await this.findByEmail(email);
    if (!user || !user.password) {
      return null;
    }

    const matches = await bcrypt.compare(password, user.password);
    return matches ? user : null;
  }

  /**
   * Finds the account for an identity-provider subject, creating it on first
   * sign-in and refreshing name and email on later ones.
   */
  async upsertFromIdentity(identity: Identity): Promise<User> {
    const email = normalizeEmail(identity.email);
    const existing =
      (await this.users.findOneBy({ subject: identity.subject })) ??
      (await this.users.findOneBy({ email }));

    if (existing) {
      existing.subject = identity.subject;
      existing.username = identity.name;
      if (existing.email !== email) {
        // The email index is unique; another account may already hold it
        const holder = await this.users.findOneBy({ email });
        if (holder) {
          logger.warn(
            { userId: existing.id, holderId: holder.id },
            'Identity email belongs to another account, keeping the stored one'
          );
        } else {
          existing.email = email;
        }
      }
      return this.users.save(existing);
    }

    const created = await this.users.save(
      this.users.create({
        username: identity.name,
        email,
        password: null,
        subject: identity.subject,
      })
    );
    logger.info({ userId: created.id }, 'User created from identity provider');
    return created;
  }
}
