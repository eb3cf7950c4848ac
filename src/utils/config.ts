import dotenv from 'dotenv';
import { Config } from '../types';
import logger from './logger';

dotenv.config();

const getEnv = (key: string): string | undefined => {
  const value = process.env[key];
  return value && value.trim() ? value.trim() : undefined;
};

function readInteger(key: string, fallback: number, min: number, max = Number.MAX_SAFE_INTEGER): number {
  const raw = getEnv(key);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`Invalid value for ${key}: "${raw}" (expected an integer from ${min} to ${max})`);
  }
  return value;
}

function readSubnet(key: string, fallback: string): string {
  const subnet = getEnv(key) ?? fallback;
  const octets = subnet.split('.');
  const valid =
    octets.length === 3 && octets.every((octet) => /^\d{1,3}$/.test(octet) && Number(octet) <= 255);
  if (!valid) {
    throw new Error(`Invalid value for ${key}: "${subnet}" (expected the first three octets, e.g. 10.0.0)`);
  }
  return subnet;
}

export const loadConfig = (): Config => {
  logger.info('Starting configuration loading...');

  const required = ['TELEGRAM_BOT_TOKEN', 'TELEGRAM_ADMIN_IDS'];
  const missing = required.filter((key) => !getEnv(key));

  if (missing.length > 0) {
    const errorMsg = `Missing required environment variables: ${missing.join(', ')}`;
    logger.error(errorMsg);
    throw new Error(errorMsg);
  }

  const adminIds = (getEnv('TELEGRAM_ADMIN_IDS') ?? '')
    .split(',')
    .map((id) => parseInt(id.trim(), 10))
    .filter((id) => !isNaN(id));

  if (adminIds.length === 0) {
    throw new Error('TELEGRAM_ADMIN_IDS must contain at least one numeric Telegram id');
  }

  const config: Config = {
    telegramBotToken: getEnv('TELEGRAM_BOT_TOKEN') ?? '',
    adminIds,
    dbPath: getEnv('DB_PATH') ?? 'data/bot.sqlite',
    vpnConfigDir: getEnv('VPN_CONFIG_DIR') ?? 'data/configs',
    checkIntervalMinutes: readInteger('SUBSCRIPTION_CHECK_INTERVAL_MINUTES', 60, 1),
    expiryWarningDays: readInteger('EXPIRY_WARNING_DAYS', 3, 0),
    sshConnectTimeoutMs: readInteger('SSH_CONNECT_TIMEOUT_MS', 30000, 1),
    serverSetupTimeoutMs: readInteger('SERVER_SETUP_TIMEOUT_MS', 30000, 1),
    adminActionTimeoutMs: readInteger('ADMIN_ACTION_TIMEOUT_MS', 10000, 1),
    wireguard: {
      interfaceName: getEnv('WG_INTERFACE') ?? 'wg0',
      subnet: readSubnet('WG_SUBNET', '10.0.0'),
      listenPort: readInteger('WG_LISTEN_PORT', 51820, 1, 65535),
      dns: getEnv('WG_DNS') ?? '8.8.8.8, 1.1.1.1',
      keepalive: readInteger('WG_KEEPALIVE', 25, 0)
    }
  };

  logger.info('Configuration loaded successfully', {
    adminCount: config.adminIds.length,
    dbPath: config.dbPath,
    vpnConfigDir: config.vpnConfigDir,
    checkIntervalMinutes: config.checkIntervalMinutes,
    interfaceName: config.wireguard.interfaceName
  });

  return config;
};
