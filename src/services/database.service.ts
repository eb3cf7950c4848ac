import Database from 'better-sqlite3';
import fs from 'fs';
import path from 'path';
import {
  NewPayment,
  NewServer,
  NewSubscription,
  Payment,
  Server,
  Subscription,
  SubscriptionPlan,
  SubscriptionRepository,
  SubscriptionStatus,
  TelegramProfile,
  User
} from '../types';
import { NotFoundError } from '../utils/errors';
import logger from '../utils/logger';

interface ServerRow {
  id: number;
  ip: string;
  port: number;
  ssh_user: string;
  ssh_password: string;
  max_clients: number;
  current_clients: number;
  is_active: number;
  created_at: number;
  updated_at: number;
}

interface UserRow {
  id: number;
  telegram_id: number;
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  is_admin: number;
  created_at: number;
  updated_at: number;
}

interface PlanRow {
  id: number;
  name: string;
  description: string;
  price: number;
  duration: number;
  is_active: number;
}

interface SubscriptionRow {
  id: number;
  user_id: number;
  server_id: number;
  plan_id: number;
  start_date: number;
  end_date: number;
  status: SubscriptionStatus;
  config_file_path: string;
  data_usage: number;
  last_connection_at: number | null;
  created_at: number;
  updated_at: number;
}

interface PaymentRow {
  id: number;
  user_id: number;
  subscription_id: number | null;
  amount: number;
  payment_method: string;
  payment_id: string;
  status: Payment['status'];
  created_at: number;
}

const DEFAULT_PLANS: ReadonlyArray<Omit<SubscriptionPlan, 'id' | 'isActive'>> = [
  { name: 'Базовый', description: 'Базовый план на 1 месяц', price: 299, duration: 30 },
  { name: 'Стандарт', description: 'Стандартный план на 3 месяца', price: 799, duration: 90 },
  { name: 'Премиум', description: 'Премиум план на 12 месяцев', price: 2499, duration: 365 }
];

function toServer(row: ServerRow): Server {
  return {
    id: row.id,
    ip: row.ip,
    port: row.port,
    sshUser: row.ssh_user,
    sshPassword: row.ssh_password,
    maxClients: row.max_clients,
    currentClients: row.current_clients,
    isActive: row.is_active === 1,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function toUser(row: UserRow): User {
  return {
    id: row.id,
    telegramId: row.telegram_id,
    username: row.username ?? '',
    firstName: row.first_name ?? '',
    lastName: row.last_name ?? '',
    isAdmin: row.is_admin === 1,
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function toPlan(row: PlanRow): SubscriptionPlan {
  return {
    id: row.id,
    name: row.name,
    description: row.description,
    price: row.price,
    duration: row.duration,
    isActive: row.is_active === 1
  };
}

function toSubscription(row: SubscriptionRow): Subscription {
  return {
    id: row.id,
    userId: row.user_id,
    serverId: row.server_id,
    planId: row.plan_id,
    startDate: new Date(row.start_date),
    endDate: new Date(row.end_date),
    status: row.status,
    configFilePath: row.config_file_path,
    dataUsage: row.data_usage,
    lastConnectionAt: row.last_connection_at === null ? null : new Date(row.last_connection_at),
    createdAt: new Date(row.created_at),
    updatedAt: new Date(row.updated_at)
  };
}

function toPayment(row: PaymentRow): Payment {
  return {
    id: row.id,
    userId: row.user_id,
    subscriptionId: row.subscription_id,
    amount: row.amount,
    paymentMethod: row.payment_method,
    paymentId: row.payment_id,
    status: row.status,
    createdAt: new Date(row.created_at)
  };
}

export class DatabaseService implements SubscriptionRepository {
  private db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma('foreign_keys = ON');

    this.initializeTables();
    this.seedPlans();
    logger.info('Database initialized', { dbPath });
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS servers (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        ip TEXT NOT NULL,
        port INTEGER NOT NULL,
        ssh_user TEXT NOT NULL,
        ssh_password TEXT NOT NULL,
        max_clients INTEGER NOT NULL DEFAULT 10,
        current_clients INTEGER NOT NULL DEFAULT 0,
        is_active INTEGER NOT NULL DEFAULT 1,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS subscription_plans (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL,
        description TEXT NOT NULL,
        price INTEGER NOT NULL,
        duration INTEGER NOT NULL,
        is_active INTEGER NOT NULL DEFAULT 1
      );

      CREATE TABLE IF NOT EXISTS users (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        telegram_id INTEGER NOT NULL UNIQUE,
        username TEXT,
        first_name TEXT,
        last_name TEXT,
        is_admin INTEGER NOT NULL DEFAULT 0,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS subscriptions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id),
        server_id INTEGER NOT NULL REFERENCES servers(id),
        plan_id INTEGER NOT NULL REFERENCES subscription_plans(id),
        start_date INTEGER NOT NULL,
        end_date INTEGER NOT NULL,
        status TEXT NOT NULL,
        config_file_path TEXT NOT NULL,
        data_usage INTEGER NOT NULL DEFAULT 0,
        last_connection_at INTEGER,
        created_at INTEGER NOT NULL,
        updated_at INTEGER NOT NULL
      );

      CREATE TABLE IF NOT EXISTS payments (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        user_id INTEGER NOT NULL REFERENCES users(id),
        subscription_id INTEGER REFERENCES subscriptions(id),
        amount INTEGER NOT NULL,
        payment_method TEXT NOT NULL,
        payment_id TEXT NOT NULL,
        status TEXT NOT NULL,
        created_at INTEGER NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_subscriptions_status ON subscriptions(status);
      CREATE INDEX IF NOT EXISTS idx_subscriptions_user_id ON subscriptions(user_id);
      CREATE INDEX IF NOT EXISTS idx_payments_user_id ON payments(user_id);
    `);
  }

  private seedPlans() {
    const row = this.db.prepare<[], { count: number }>('SELECT COUNT(*) AS count FROM subscription_plans').get();
    if (row && row.count > 0) return;

    const insert = this.db.prepare<[string, string, number, number]>(
      'INSERT INTO subscription_plans (name, description, price, duration) VALUES (?, ?, ?, ?)'
    );
    const seed = this.db.transaction(() => {
      for (const plan of DEFAULT_PLANS) {
        insert.run(plan.name, plan.description, plan.price, plan.duration);
      }
    });
    seed();
    logger.info('Default subscription plans created', { count: DEFAULT_PLANS.length });
  }

  // Серверы

  getServerById(id: number): Server {
    const row = this.db.prepare<[number], ServerRow>('SELECT * FROM servers WHERE id = ?').get(id);
    if (!row) throw new NotFoundError('Server', id);
    return toServer(row);
  }

  getAllServers(): Server[] {
    return this.db.prepare<[], ServerRow>('SELECT * FROM servers ORDER BY id').all().map(toServer);
  }

  addServer(server: NewServer): Server {
    const now = Date.now();
    const result = this.db
      .prepare<[string, number, string, string, number, number, number]>(
        `INSERT INTO servers (ip, port, ssh_user, ssh_password, max_clients, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(server.ip, server.port, server.sshUser, server.sshPassword, server.maxClients, now, now);

    logger.info('Server added', { id: result.lastInsertRowid, ip: server.ip, port: server.port });
    return this.getServerById(Number(result.lastInsertRowid));
  }

  /**
   * Занимает место на первом активном сервере со свободной ёмкостью.
   * @returns null, если свободных серверов нет
   */
  reserveServerSlot(): Server | null {
    const reserve = this.db.transaction((): Server | null => {
      const row = this.db
        .prepare<[], ServerRow>(
          `SELECT * FROM servers
           WHERE is_active = 1 AND current_clients < max_clients
           ORDER BY current_clients ASC, id ASC
           LIMIT 1`
        )
        .get();
      if (!row) return null;

      this.db
        .prepare<[number, number]>(
          'UPDATE servers SET current_clients = current_clients + 1, updated_at = ? WHERE id = ?'
        )
        .run(Date.now(), row.id);
      return this.getServerById(row.id);
    });

    return reserve.immediate();
  }

  releaseServerSlot(serverId: number): void {
    this.db
      .prepare<[number, number]>(
        'UPDATE servers SET current_clients = MAX(current_clients - 1, 0), updated_at = ? WHERE id = ?'
      )
      .run(Date.now(), serverId);
  }

  // Пользователи

  getUserById(id: number): User {
    const row = this.db.prepare<[number], UserRow>('SELECT * FROM users WHERE id = ?').get(id);
    if (!row) throw new NotFoundError('User', id);
    return toUser(row);
  }

  getUserByTelegramId(telegramId: number): User | null {
    const row = this.db.prepare<[number], UserRow>('SELECT * FROM users WHERE telegram_id = ?').get(telegramId);
    return row ? toUser(row) : null;
  }

  /** Создаёт пользователя или обновляет его имя; флаг администратора не трогает */
  upsertUser(profile: TelegramProfile): User {
    const now = Date.now();
    this.db
      .prepare<[number, string | null, string | null, string | null, number, number]>(
        `INSERT INTO users (telegram_id, username, first_name, last_name, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)
         ON CONFLICT(telegram_id) DO UPDATE SET
           username = excluded.username,
           first_name = excluded.first_name,
           last_name = excluded.last_name,
           updated_at = excluded.updated_at`
      )
      .run(profile.telegramId, profile.username ?? null, profile.firstName ?? null, profile.lastName ?? null, now, now);

    const user = this.getUserByTelegramId(profile.telegramId);
    if (!user) throw new NotFoundError('User with Telegram id', profile.telegramId);
    return user;
  }

  ensureAdmin(telegramId: number): User {
    const user = this.getUserByTelegramId(telegramId) ?? this.upsertUser({ telegramId });
    if (!user.isAdmin) {
      this.db
        .prepare<[number, number]>('UPDATE users SET is_admin = 1, updated_at = ? WHERE id = ?')
        .run(Date.now(), user.id);
      logger.info('User promoted to admin', { telegramId });
    }
    return this.getUserById(user.id);
  }

  getAllAdmins(): User[] {
    return this.db.prepare<[], UserRow>('SELECT * FROM users WHERE is_admin = 1 ORDER BY id').all().map(toUser);
  }

  // Тарифы

  getPlanById(id: number): SubscriptionPlan {
    const row = this.db.prepare<[number], PlanRow>('SELECT * FROM subscription_plans WHERE id = ?').get(id);
    if (!row) throw new NotFoundError('Subscription plan', id);
    return toPlan(row);
  }

  getActivePlans(): SubscriptionPlan[] {
    return this.db
      .prepare<[], PlanRow>('SELECT * FROM subscription_plans WHERE is_active = 1 ORDER BY duration')
      .all()
      .map(toPlan);
  }

  // Подписки

  getActiveSubscriptions(): Subscription[] {
    return this.db
      .prepare<[], SubscriptionRow>("SELECT * FROM subscriptions WHERE status = 'active' ORDER BY end_date")
      .all()
      .map(toSubscription);
  }

  getSubscriptionById(id: number): Subscription {
    const row = this.db.prepare<[number], SubscriptionRow>('SELECT * FROM subscriptions WHERE id = ?').get(id);
    if (!row) throw new NotFoundError('Subscription', id);
    return toSubscription(row);
  }

  getSubscriptionsByUserId(userId: number): Subscription[] {
    return this.db
      .prepare<[number], SubscriptionRow>('SELECT * FROM subscriptions WHERE user_id = ? ORDER BY created_at DESC, id DESC')
      .all(userId)
      .map(toSubscription);
  }

  addSubscription(subscription: NewSubscription): Subscription {
    const now = Date.now();
    const result = this.db
      .prepare<[number, number, number, number, number, SubscriptionStatus, string, number, number]>(
        `INSERT INTO subscriptions
         (user_id, server_id, plan_id, start_date, end_date, status, config_file_path, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        subscription.userId,
        subscription.serverId,
        subscription.planId,
        subscription.startDate.getTime(),
        subscription.endDate.getTime(),
        subscription.status,
        subscription.configFilePath,
        now,
        now
      );

    logger.info('Subscription added', { id: result.lastInsertRowid, userId: subscription.userId });
    return this.getSubscriptionById(Number(result.lastInsertRowid));
  }

  updateSubscription(subscription: Subscription): void {
    const result = this.db
      .prepare<[number, number, SubscriptionStatus, string, number, number | null, number, number]>(
        `UPDATE subscriptions SET
           start_date = ?, end_date = ?, status = ?, config_file_path = ?,
           data_usage = ?, last_connection_at = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(
        subscription.startDate.getTime(),
        subscription.endDate.getTime(),
        subscription.status,
        subscription.configFilePath,
        subscription.dataUsage,
        subscription.lastConnectionAt ? subscription.lastConnectionAt.getTime() : null,
        Date.now(),
        subscription.id
      );

    if (result.changes === 0) throw new NotFoundError('Subscription', subscription.id);
  }

  // Платежи

  addPayment(payment: NewPayment): Payment {
    const now = Date.now();
    const result = this.db
      .prepare<[number, number | null, number, string, string, Payment['status'], number]>(
        `INSERT INTO payments (user_id, subscription_id, amount, payment_method, payment_id, status, created_at)
         VALUES (?, ?, ?, ?, ?, ?, ?)`
      )
      .run(
        payment.userId,
        payment.subscriptionId,
        payment.amount,
        payment.paymentMethod,
        payment.paymentId,
        payment.status,
        now
      );

    const row = this.db
      .prepare<[number], PaymentRow>('SELECT * FROM payments WHERE id = ?')
      .get(Number(result.lastInsertRowid));
    if (!row) throw new NotFoundError('Payment', Number(result.lastInsertRowid));
    return toPayment(row);
  }

  getPaymentsByUserId(userId: number): Payment[] {
    return this.db
      .prepare<[number], PaymentRow>('SELECT * FROM payments WHERE user_id = ? ORDER BY id')
      .all(userId)
      .map(toPayment);
  }

  close() {
    this.db.close();
  }
}
