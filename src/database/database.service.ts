import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { APP_CONFIG, type AppConfig } from '../config/configuration';
import { UniqueConstraintError } from '../common/errors';

export interface UserRow {
  id: string;
  name: string;
  username: string;
  email: string;
  password_hash: string | null;
  profile_image_url: string | null;
  is_superuser: number;
  created_at: string;
  updated_at: string;
}

export interface PickupAddressRow {
  id: number;
  name: string;
  phone: string;
  email: string | null;
  company_name: string | null;
  address_line1: string;
  address_line2: string | null;
  address_line3: string | null;
  city_locality: string;
  state_province: string;
  postal_code: string;
  country_code: string;
  address_residential_indicator: string | null;
  created_at: string;
  updated_at: string | null;
}

export interface PickupRow {
  id: number;
  pickup_id: string;
  pickup_address_id: number;
  label_ids: string;
  contact_details: string;
  pickup_window_start: string;
  pickup_window_end: string;
  pickup_notes: string | null;
  carrier_id: string | null;
  confirmation_number: string | null;
  warehouse_id: string | null;
  notification_job_id: string | null;
  status: string;
  created_at: string;
  updated_at: string | null;
  cancelled_at: string | null;
}

export interface JobRow {
  id: string;
  name: string;
  payload: string;
  run_at: string;
  status: string;
  attempts: number;
  result: string | null;
  last_error: string | null;
  delivered_at: string | null;
  created_at: string;
  updated_at: string;
}

export type NewPickupAddress = Omit<PickupAddressRow, 'id' | 'created_at' | 'updated_at'>;

export interface NewPickup {
  pickupId: string;
  labelIds: string[];
  contactDetails: Record<string, string>;
  pickupWindowStart: string;
  pickupWindowEnd: string;
  pickupNotes?: string | null;
  carrierId?: string | null;
  confirmationNumber?: string | null;
  warehouseId?: string | null;
}

@Injectable()
export class DatabaseService implements OnModuleInit, OnModuleDestroy {
  private db!: Database.Database;
  private readonly logger = new Logger(DatabaseService.name);
  private readonly dbPath: string;

  constructor(@Inject(APP_CONFIG) config: AppConfig) {
    this.dbPath = config.database.path;
  }

  onModuleInit() {
    this.connect();
    this.createTables();
  }

  onModuleDestroy() {
    this.db?.close();
  }

  private connect() {
    const inMemory = this.dbPath === ':memory:';

    if (!inMemory) {
      const dir = path.dirname(this.dbPath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }
    }

    this.db = new Database(this.dbPath);
    if (!inMemory) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('foreign_keys = ON');
    this.logger.log(`Connected to SQLite database: ${this.dbPath}`);
  }

  private createTables() {
    // password_hash stays nullable: OAuth accounts never get one
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS users (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        username TEXT UNIQUE NOT NULL,
        email TEXT UNIQUE NOT NULL,
        password_hash TEXT,
        profile_image_url TEXT,
        is_superuser INTEGER NOT NULL DEFAULT 0,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS revoked_tokens (
        jti TEXT PRIMARY KEY,
        expires_at TEXT NOT NULL
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pickup_addresses (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        phone TEXT NOT NULL,
        email TEXT,
        company_name TEXT,
        address_line1 TEXT NOT NULL,
        address_line2 TEXT,
        address_line3 TEXT,
        city_locality TEXT NOT NULL,
        state_province TEXT NOT NULL,
        postal_code TEXT NOT NULL,
        country_code TEXT NOT NULL,
        address_residential_indicator TEXT DEFAULT 'no',
        created_at TEXT NOT NULL,
        updated_at TEXT
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS pickups (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        pickup_id TEXT UNIQUE NOT NULL,
        pickup_address_id INTEGER NOT NULL,
        label_ids TEXT NOT NULL,
        contact_details TEXT NOT NULL,
        pickup_window_start TEXT NOT NULL,
        pickup_window_end TEXT NOT NULL,
        pickup_notes TEXT,
        carrier_id TEXT,
        confirmation_number TEXT,
        warehouse_id TEXT,
        notification_job_id TEXT,
        status TEXT NOT NULL DEFAULT 'scheduled',
        created_at TEXT NOT NULL,
        updated_at TEXT,
        cancelled_at TEXT,
        FOREIGN KEY (pickup_address_id) REFERENCES pickup_addresses(id)
      )
    `);

    this.db.exec(`
      CREATE TABLE IF NOT EXISTS jobs (
        id TEXT PRIMARY KEY,
        name TEXT NOT NULL,
        payload TEXT NOT NULL,
        run_at TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending',
        attempts INTEGER NOT NULL DEFAULT 0,
        result TEXT,
        last_error TEXT,
        delivered_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      )
    `);

    // Job tables created before delivery tracking
    const jobColumns = this.db.prepare('PRAGMA table_info(jobs)').all() as { name: string }[];
    if (!jobColumns.some((column) => column.name === 'delivered_at')) {
      this.db.exec('ALTER TABLE jobs ADD COLUMN delivered_at TEXT');
    }

    this.db.exec(`
      CREATE INDEX IF NOT EXISTS idx_pickups_status ON pickups(status);
      CREATE INDEX IF NOT EXISTS idx_pickups_address_id ON pickups(pickup_address_id);
      CREATE INDEX IF NOT EXISTS idx_jobs_status_run_at ON jobs(status, run_at);
      CREATE INDEX IF NOT EXISTS idx_revoked_tokens_expires_at ON revoked_tokens(expires_at);
    `);

    this.logger.log('Database tables initialized');
  }

  getDatabase(): Database.Database {
    return this.db;
  }

  /**
   * Runs `operation` in a single transaction; nothing it wrote survives a throw.
   */
  transaction<T>(operation: () => T): T {
    return this.db.transaction(operation)();
  }

  // User operations
  createUser(user: {
    id: string;
    name: string;
    username: string;
    email: string;
    passwordHash: string | null;
    profileImageUrl?: string | null;
    isSuperuser?: boolean;
  }): UserRow {
    const stmt = this.db.prepare(`
      INSERT INTO users (
        id, name, username, email, password_hash, profile_image_url,
        is_superuser, created_at, updated_at
      )
      VALUES (
        $id, $name, $username, $email, $passwordHash, $profileImageUrl,
        $isSuperuser, $createdAt, $updatedAt
      )
    `);

    const now = new Date().toISOString();
    this.withConstraintErrors(() =>
      stmt.run({
        id: user.id,
        name: user.name,
        username: user.username,
        email: user.email,
        passwordHash: user.passwordHash,
        profileImageUrl: user.profileImageUrl ?? null,
        isSuperuser: user.isSuperuser ? 1 : 0,
        createdAt: now,
        updatedAt: now,
      }),
    );

    const created = this.findUserById(user.id);
    if (!created) {
      throw new Error(`User ${user.id} missing after insert`);
    }
    return created;
  }

  findUserById(id: string): UserRow | null {
    const stmt = this.db.prepare('SELECT * FROM users WHERE id = ?');
    return (stmt.get(id) as UserRow | undefined) ?? null;
  }

  findUserByEmail(email: string): UserRow | null {
    const stmt = this.db.prepare('SELECT * FROM users WHERE email = ?');
    return (stmt.get(email) as UserRow | undefined) ?? null;
  }

  findUserByUsername(username: string): UserRow | null {
    const stmt = this.db.prepare('SELECT * FROM users WHERE username = ?');
    return (stmt.get(username) as UserRow | undefined) ?? null;
  }

  // Revoked token operations
  revokeToken(jti: string, expiresAt: Date) {
    this.db
      .prepare('INSERT OR IGNORE INTO revoked_tokens (jti, expires_at) VALUES (?, ?)')
      .run(jti, expiresAt.toISOString());
  }

  isTokenRevoked(jti: string): boolean {
    const row = this.db.prepare('SELECT 1 AS revoked FROM revoked_tokens WHERE jti = ?').get(jti);
    return row !== undefined;
  }

  purgeExpiredRevokedTokens(now: Date = new Date()): number {
    const result = this.db
      .prepare('DELETE FROM revoked_tokens WHERE expires_at <= ?')
      .run(now.toISOString());
    return result.changes;
  }

  // Pickup operations
  createPickupWithAddress(pickup: NewPickup, address: NewPickupAddress): number {
    const insertAddress = this.db.prepare(`
      INSERT INTO pickup_addresses (
        name, phone, email, company_name, address_line1, address_line2, address_line3,
        city_locality, state_province, postal_code, country_code,
        address_residential_indicator, created_at
      )
      VALUES (
        $name, $phone, $email, $companyName, $addressLine1, $addressLine2, $addressLine3,
        $cityLocality, $stateProvince, $postalCode, $countryCode,
        $addressResidentialIndicator, $createdAt
      )
    `);

    const insertPickup = this.db.prepare(`
      INSERT INTO pickups (
        pickup_id, pickup_address_id, label_ids, contact_details,
        pickup_window_start, pickup_window_end, pickup_notes,
        carrier_id, confirmation_number, warehouse_id, status, created_at
      )
      VALUES (
        $pickupId, $pickupAddressId, $labelIds, $contactDetails,
        $pickupWindowStart, $pickupWindowEnd, $pickupNotes,
        $carrierId, $confirmationNumber, $warehouseId, 'scheduled', $createdAt
      )
    `);

    const now = new Date().toISOString();
    const insertBoth = this.db.transaction(() => {
      const addressResult = insertAddress.run({
        name: address.name,
        phone: address.phone,
        email: address.email,
        companyName: address.company_name,
        addressLine1: address.address_line1,
        addressLine2: address.address_line2,
        addressLine3: address.address_line3,
        cityLocality: address.city_locality,
        stateProvince: address.state_province,
        postalCode: address.postal_code,
        countryCode: address.country_code,
        addressResidentialIndicator: address.address_residential_indicator,
        createdAt: now,
      });

      const pickupResult = insertPickup.run({
        pickupId: pickup.pickupId,
        pickupAddressId: Number(addressResult.lastInsertRowid),
        labelIds: JSON.stringify(pickup.labelIds),
        contactDetails: JSON.stringify(pickup.contactDetails),
        pickupWindowStart: pickup.pickupWindowStart,
        pickupWindowEnd: pickup.pickupWindowEnd,
        pickupNotes: pickup.pickupNotes ?? null,
        carrierId: pickup.carrierId ?? null,
        confirmationNumber: pickup.confirmationNumber ?? null,
        warehouseId: pickup.warehouseId ?? null,
        createdAt: now,
      });
      return Number(pickupResult.lastInsertRowid);
    });

    return this.withConstraintErrors(() => insertBoth());
  }

  findPickupByPickupId(pickupId: string): PickupRow | null {
    const stmt = this.db.prepare('SELECT * FROM pickups WHERE pickup_id = ?');
    return (stmt.get(pickupId) as PickupRow | undefined) ?? null;
  }

  findActivePickupByPickupId(pickupId: string): PickupRow | null {
    const stmt = this.db.prepare(
      "SELECT * FROM pickups WHERE pickup_id = ? AND status != 'cancelled'",
    );
    return (stmt.get(pickupId) as PickupRow | undefined) ?? null;
  }

  findActivePickups(offset: number, limit: number): PickupRow[] {
    const stmt = this.db.prepare(`
      SELECT * FROM pickups
      WHERE status != 'cancelled'
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
    `);
    return stmt.all(limit, offset) as PickupRow[];
  }

  countActivePickups(): number {
    const row = this.db
      .prepare("SELECT COUNT(*) AS count FROM pickups WHERE status != 'cancelled'")
      .get() as { count: number };
    return row.count;
  }

  findPickupAddressById(id: number): PickupAddressRow | null {
    const stmt = this.db.prepare('SELECT * FROM pickup_addresses WHERE id = ?');
    return (stmt.get(id) as PickupAddressRow | undefined) ?? null;
  }

  setPickupNotificationJob(pickupId: string, jobId: string) {
    this.db
      .prepare('UPDATE pickups SET notification_job_id = ?, updated_at = ? WHERE pickup_id = ?')
      .run(jobId, new Date().toISOString(), pickupId);
  }

  cancelPickup(pickupId: string, cancelledAt: Date): boolean {
    const at = cancelledAt.toISOString();
    const result = this.db
      .prepare(`
        UPDATE pickups SET status = 'cancelled', cancelled_at = ?, updated_at = ?
        WHERE pickup_id = ? AND status != 'cancelled'
      `)
      .run(at, at, pickupId);
    return result.changes > 0;
  }

  // Job operations
  insertJob(job: { id: string; name: string; payload: string; runAt: Date }): JobRow {
    const now = new Date().toISOString();
    this.db
      .prepare(`
        INSERT INTO jobs (id, name, payload, run_at, status, attempts, created_at, updated_at)
        VALUES ($id, $name, $payload, $runAt, 'pending', 0, $createdAt, $updatedAt)
      `)
      .run({
        id: job.id,
        name: job.name,
        payload: job.payload,
        runAt: job.runAt.toISOString(),
        createdAt: now,
        updatedAt: now,
      });

    const created = this.findJobById(job.id);
    if (!created) {
      throw new Error(`Job ${job.id} missing after insert`);
    }
    return created;
  }

  findJobById(id: string): JobRow | null {
    const stmt = this.db.prepare('SELECT * FROM jobs WHERE id = ?');
    return (stmt.get(id) as JobRow | undefined) ?? null;
  }

  findDuePendingJobs(now: Date, limit: number): JobRow[] {
    const stmt = this.db.prepare(`
      SELECT * FROM jobs
      WHERE status = 'pending' AND run_at <= ?
      ORDER BY run_at ASC
      LIMIT ?
    `);
    return stmt.all(now.toISOString(), limit) as JobRow[];
  }

  /**
   * Moves a job from pending to running. Returns false when another worker got there first.
   */
  claimJob(id: string): boolean {
    const result = this.db
      .prepare(`
        UPDATE jobs SET status = 'running', attempts = attempts + 1, updated_at = ?
        WHERE id = ? AND status = 'pending'
      `)
      .run(new Date().toISOString(), id);
    return result.changes > 0;
  }

  completeJob(id: string, result: string) {
    this.db
      .prepare("UPDATE jobs SET status = 'completed', result = ?, updated_at = ? WHERE id = ?")
      .run(result, new Date().toISOString(), id);
  }

  /**
   * Records that the job's side effect happened, so a rerun after a crash can tell.
   */
  markJobDelivered(id: string, deliveredAt: Date) {
    this.db
      .prepare('UPDATE jobs SET delivered_at = ?, updated_at = ? WHERE id = ?')
      .run(deliveredAt.toISOString(), new Date().toISOString(), id);
  }

  failJob(id: string, error: string) {
    this.db
      .prepare("UPDATE jobs SET status = 'failed', last_error = ?, updated_at = ? WHERE id = ?")
      .run(error, new Date().toISOString(), id);
  }

  cancelJob(id: string): boolean {
    const result = this.db
      .prepare("UPDATE jobs SET status = 'cancelled', updated_at = ? WHERE id = ? AND status = 'pending'")
      .run(new Date().toISOString(), id);
    return result.changes > 0;
  }

  requeueRunningJobs(): number {
    const result = this.db
      .prepare("UPDATE jobs SET status = 'pending', updated_at = ? WHERE status = 'running'")
      .run(new Date().toISOString());
    return result.changes;
  }

  countJobsByStatus(): Record<string, number> {
    const rows = this.db
      .prepare('SELECT status, COUNT(*) AS count FROM jobs GROUP BY status')
      .all() as { status: string; count: number }[];
    return Object.fromEntries(rows.map((row) => [row.status, row.count]));
  }

  private withConstraintErrors<T>(operation: () => T): T {
    try {
      return operation();
    } catch (error) {
      if (
        error instanceof Error &&
        'code' in error &&
        error.code === 'SQLITE_CONSTRAINT_UNIQUE'
      ) {
        const match = /UNIQUE constraint failed: (\w+)\.(\w+)/.exec(error.message);
        throw new UniqueConstraintError(match?.[1] ?? 'unknown', match?.[2] ?? 'unknown');
      }
      throw error;
    }
  }
}
