export interface Config {
  telegramBotToken: string;
  adminIds: number[];
  dbPath: string;
  vpnConfigDir: string;
  checkIntervalMinutes: number;
  expiryWarningDays: number;
  sshConnectTimeoutMs: number;
  serverSetupTimeoutMs: number;
  adminActionTimeoutMs: number;
  wireguard: WireGuardSettings;
}

export interface WireGuardSettings {
  interfaceName: string;
  /** Первые три октета сети /24, например "10.0.0" */
  subnet: string;
  listenPort: number;
  dns: string;
  keepalive: number;
}

export interface Server {
  id: number;
  ip: string;
  port: number;
  sshUser: string;
  sshPassword: string;
  maxClients: number;
  currentClients: number;
  isActive: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type NewServer = Pick<Server, 'ip' | 'port' | 'sshUser' | 'sshPassword' | 'maxClients'>;

export interface User {
  id: number;
  telegramId: number;
  username: string;
  firstName: string;
  lastName: string;
  isAdmin: boolean;
  createdAt: Date;
  updatedAt: Date;
}

export type TelegramProfile = Pick<User, 'telegramId'> & Partial<Pick<User, 'username' | 'firstName' | 'lastName'>>;

export interface SubscriptionPlan {
  id: number;
  name: string;
  description: string;
  price: number;
  /** Длительность в днях */
  duration: number;
  isActive: boolean;
}

export type SubscriptionStatus = 'active' | 'expired' | 'blocked' | 'revoked';

export interface Subscription {
  id: number;
  userId: number;
  serverId: number;
  planId: number;
  startDate: Date;
  endDate: Date;
  status: SubscriptionStatus;
  configFilePath: string;
  dataUsage: number;
  lastConnectionAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

export type NewSubscription = Pick<
  Subscription,
  'userId' | 'serverId' | 'planId' | 'startDate' | 'endDate' | 'status' | 'configFilePath'
>;

export type PaymentStatus = 'completed' | 'failed' | 'refunded';

export interface Payment {
  id: number;
  userId: number;
  subscriptionId: number | null;
  amount: number;
  paymentMethod: string;
  paymentId: string;
  status: PaymentStatus;
  createdAt: Date;
}

export type NewPayment = Omit<Payment, 'id' | 'createdAt'>;

export interface ServerInfo {
  publicKey: string;
  publicIp: string;
  listenPort: number;
}

/** Параметры SSH-подключения к серверу */
export interface HostTarget {
  host: string;
  port: number;
  username: string;
  password: string;
}

export interface RemoteShell {
  run(command: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
}

export interface RemoteSession extends RemoteShell {
  close(): void;
}

export interface HostConnector {
  connect(target: HostTarget, timeoutMs: number): Promise<RemoteSession>;
}

export interface NotificationSink {
  notify(chatId: number, text: string): Promise<void>;
}

/** Часть хранилища, которой пользуется фоновая проверка подписок */
export interface SubscriptionRepository {
  getActiveSubscriptions(): Subscription[];
  updateSubscription(subscription: Subscription): void;
  getServerById(id: number): Server;
  getUserById(id: number): User;
  getPlanById(id: number): SubscriptionPlan;
  getAllAdmins(): User[];
  releaseServerSlot(serverId: number): void;
}

/** Отзыв клиентского конфига на сервере */
export interface ClientRevoker {
  revokeClientConfig(server: Server, configPath: string): Promise<void>;
}

/** Операции над клиентами сервера, которые нужны покупке и админским командам */
export interface ClientProvisioner extends ClientRevoker {
  setupServer(server: Server): Promise<void>;
  createClientConfig(server: Server, clientName: string): Promise<string>;
  blockClient(server: Server, configPath: string): Promise<boolean>;
  unblockClient(server: Server, configPath: string): Promise<boolean>;
  isClientBlocked(server: Server, configPath: string): Promise<boolean>;
}

/** Данные об оплате Telegram Stars */
export interface StarsCharge {
  chargeId: string;
  amount: number;
}

export interface PaymentRefunder {
  refund(telegramId: number, chargeId: string): Promise<void>;
}
