import { ConflictException, Injectable, Logger } from '@nestjs/common';
import { randomUUID } from 'crypto';
import { DatabaseService, type UserRow } from '../database/database.service';
import { UniqueConstraintError } from '../common/errors';
import { hashPassword } from '../auth/password';
import type { User } from './entities/user.entity';
import type { CreateUserDto, UserReadDto } from './dto/user.dto';

export interface NewUser {
  name: string;
  username: string;
  email: string;
  passwordHash: string | null;
  profileImageUrl?: string | null;
  isSuperuser?: boolean;
}

@Injectable()
export class UsersService {
  private readonly logger = new Logger(UsersService.name);

  constructor(private readonly databaseService: DatabaseService) {}

  findById(id: string): User | null {
    const row = this.databaseService.findUserById(id);
    return row ? this.rowToUser(row) : null;
  }

  findByEmail(email: string): User | null {
    const row = this.databaseService.findUserByEmail(email);
    return row ? this.rowToUser(row) : null;
  }

  findByUsername(username: string): User | null {
    const row = this.databaseService.findUserByUsername(username);
    return row ? this.rowToUser(row) : null;
  }

  /**
   * Inserts a user. Throws UniqueConstraintError when the email or username is taken.
   */
  create(input: NewUser): User {
    const row = this.databaseService.createUser({
      id: randomUUID(),
      name: input.name,
      username: input.username,
      email: input.email,
      passwordHash: input.passwordHash,
      profileImageUrl: input.profileImageUrl ?? null,
      isSuperuser: input.isSuperuser ?? false,
    });
    this.logger.log(`Created user ${row.username} (${row.password_hash ? 'password' : 'passwordless'})`);
    return this.rowToUser(row);
  }

  async register(dto: CreateUserDto): Promise<User> {
    const passwordHash = await hashPassword(dto.password);
    try {
      return this.create({
        name: dto.name,
        username: dto.username,
        email: dto.email,
        passwordHash,
      });
    } catch (error) {
      if (error instanceof UniqueConstraintError) {
        throw new ConflictException(
          error.column === 'email' ? 'Email is already registered' : 'Username not available',
        );
      }
      throw error;
    }
  }

  private rowToUser(row: UserRow): User {
    return {
      id: row.id,
      name: row.name,
      username: row.username,
      email: row.email,
      passwordHash: row.password_hash,
      profileImageUrl: row.profile_image_url,
      isSuperuser: row.is_superuser === 1,
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
    };
  }
}

export function toUserRead(user: User): UserReadDto {
  return {
    id: user.id,
    name: user.name,
    username: user.username,
    email: user.email,
    profile_image_url: user.profileImageUrl,
    is_superuser: user.isSuperuser,
    created_at: user.createdAt.toISOString(),
  };
}
