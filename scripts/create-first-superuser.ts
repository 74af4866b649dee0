/**
 * Creates the first superuser from the ADMIN_* environment variables.
 *
 * Usage: npm run create-superuser
 *
 * Does nothing when a user with that email or username already exists.
 */
import 'reflect-metadata';
import * as dotenv from 'dotenv';
import * as path from 'path';
import { randomUUID } from 'crypto';
import { loadConfig } from '../src/config/configuration';
import { DatabaseService } from '../src/database/database.service';
import { hashPassword } from '../src/auth/password';

dotenv.config({ path: path.join(process.cwd(), '.env') });

async function createFirstSuperuser() {
  const config = loadConfig(process.env);
  const { name, email, username, password } = config.firstUser;

  if (!password) {
    throw new Error('ADMIN_PASSWORD must be set to create the first superuser');
  }

  const databaseService = new DatabaseService(config);
  databaseService.onModuleInit();

  try {
    const existing =
      databaseService.findUserByEmail(email) ?? databaseService.findUserByUsername(username);
    if (existing) {
      console.log(`Superuser ${existing.username} already exists; nothing to do`);
      return;
    }

    const user = databaseService.createUser({
      id: randomUUID(),
      name,
      username,
      email,
      passwordHash: await hashPassword(password),
      isSuperuser: true,
    });
    console.log(`Created superuser ${user.username} <${user.email}>`);
  } finally {
    databaseService.onModuleDestroy();
  }
}

createFirstSuperuser().catch((error: unknown) => {
  console.error('Failed to create superuser:', error instanceof Error ? error.message : error);
  process.exit(1);
});
