import { promises as fs } from 'fs';
import path from 'path';
import {
  ClientProvisioner,
  HostConnector,
  HostTarget,
  RemoteSession,
  RemoteShell,
  Server,
  ServerInfo,
  WireGuardSettings
} from '../types';
import {
  CommandFailedError,
  ProvisioningError,
  ProvisioningStage,
  ProvisioningStageError,
  TimeoutError,
  errorMessage
} from '../utils/errors';
import { KeyedMutex } from '../utils/keyed-mutex';
import logger from '../utils/logger';
import { INSTALL_PLANS, InstallPlan, PROBE_ORDER, classifyOsFamily } from '../utils/os-family';
import { hasPeer, readInterfaceValue, readListenPort } from '../utils/peer-registry';
import { shellQuote } from '../utils/shell';
import { withTimeout } from '../utils/timeout';
import { buildClientConfig, buildServerInterface, isLikelyWireGuardClientConfig } from '../utils/wireguard-config';
import { PeerRegistry } from './peer-registry.service';

export interface ProvisioningOptions {
  /** Локальный каталог для клиентских .conf */
  configDir: string;
  connectTimeoutMs: number;
  setupTimeoutMs: number;
  wireguard: WireGuardSettings;
}

interface ServerKeys {
  privateKey: string;
  publicKey: string;
}

const WIREGUARD_DIR = '/etc/wireguard';
const PRIVATE_KEY_PATH = `${WIREGUARD_DIR}/server_private.key`;
const PUBLIC_KEY_PATH = `${WIREGUARD_DIR}/server_public.key`;
const SYSCTL_PATH = '/etc/sysctl.d/99-wireguard.conf';
const PUBLIC_IP_COMMAND =
  'curl -s --max-time 10 ifconfig.me || curl -s --max-time 10 api.ipify.org || curl -s --max-time 10 icanhazip.com';
const IPV4 = /^\d{1,3}(\.\d{1,3}){3}$/;

/** Имя клиента по пути к его .conf: имя файла без расширения */
export function clientNameFromConfigPath(configPath: string): string {
  if (!configPath) {
    throw new ProvisioningError('INVALID_CONFIG_PATH', 'Config path is empty');
  }
  const name = path.basename(configPath).replace(/\.[^.]*$/, '');
  if (!name) {
    throw new ProvisioningError('INVALID_CONFIG_PATH', `Cannot derive client name from "${configPath}"`);
  }
  return name;
}

export function hostTarget(server: Server): HostTarget {
  return {
    host: server.ip,
    port: server.port,
    username: server.sshUser,
    password: server.sshPassword
  };
}

async function stage<T>(name: ProvisioningStage, task: () => Promise<T>): Promise<T> {
  try {
    return await task();
  } catch (error) {
    if (error instanceof ProvisioningError && !(error instanceof CommandFailedError)) throw error;
    throw new ProvisioningStageError(name, error);
  }
}

async function fileExists(shell: RemoteShell, filePath: string): Promise<boolean> {
  const output = await shell.run(`test -f ${shellQuote(filePath)} && echo yes || echo no`);
  return output.trim() === 'yes';
}

async function commandSucceeds(shell: RemoteShell, command: string): Promise<boolean> {
  try {
    await shell.run(command);
    return true;
  } catch (error) {
    if (error instanceof CommandFailedError) return false;
    throw error;
  }
}

async function derivePublicKey(shell: RemoteShell, privateKey: string): Promise<string> {
  const publicKey = (await shell.run(`printf '%s' ${shellQuote(privateKey)} | wg pubkey`)).trim();
  if (!publicKey) throw new Error('wg pubkey returned an empty key');
  return publicKey;
}

/**
 * Управление WireGuard на удалённых серверах. Все операции над одним
 * сервером (ip:port) выполняются строго по очереди.
 */
export class ProvisioningService implements ClientProvisioner {
  private locks = new KeyedMutex();
  private readonly registryPath: string;
  private readonly unit: string;

  constructor(
    private connector: HostConnector,
    private options: ProvisioningOptions
  ) {
    this.registryPath = `${WIREGUARD_DIR}/${options.wireguard.interfaceName}.conf`;
    this.unit = `wg-quick@${options.wireguard.interfaceName}`;
  }

  artifactPath(clientName: string): string {
    return path.join(this.options.configDir, `${clientName}.conf`);
  }

  async setupServer(server: Server): Promise<void> {
    const address = `${server.ip}:${server.port}`;
    logger.info('Setting up server', { serverId: server.id, address });

    await this.withHost(
      server,
      async (session) => {
        await this.ensureWireGuardInstalled(session);
        await stage('configure', async () => {
          const keys = await this.ensureServerKeys(session);
          await this.ensureInterfaceConfig(session, keys);
          await session.run(`echo 'net.ipv4.ip_forward=1' > ${SYSCTL_PATH} && sysctl -p ${SYSCTL_PATH}`);
          await session.run(`systemctl enable ${this.unit} && systemctl start ${this.unit}`);
        });

        const iface = this.options.wireguard.interfaceName;
        try {
          await session.run(`ip link show ${iface}`);
        } catch (error) {
          throw new ProvisioningError('INTERFACE_VERIFICATION_FAILED', `Interface ${iface} is not up on ${address}`, {
            cause: error
          });
        }
      },
      (target) => this.connectForSetup(target)
    );

    logger.info('Server is ready', { serverId: server.id, address });
  }

  async createClientConfig(server: Server, clientName: string): Promise<string> {
    logger.info('Creating client config', { serverId: server.id, clientName });

    return this.withHost(server, async (session) => {
      const registry = new PeerRegistry(session, this.registryPath, this.options.wireguard.subnet);

      const keys = await stage('keys', async () => {
        const privateKey = (await session.run('wg genkey')).trim();
        if (!privateKey) throw new Error('wg genkey returned an empty key');
        return { privateKey, publicKey: await derivePublicKey(session, privateKey) };
      });
      const info = await stage('server-info', () => this.readServerInfo(session, server));
      const name = await stage('name', async () => this.uniqueName(await registry.read(), clientName));
      const address = await stage('address', () => registry.nextFreeAddress());

      await stage('append', () => registry.appendPeer({ name, publicKey: keys.publicKey, address }));

      // Добавленный пир остаётся в файле, даже если дальше что-то упадёт
      await stage('restart', () => this.restart(session));
      return stage('artifact', async () => {
        const config = buildClientConfig({
          privateKey: keys.privateKey,
          address,
          dns: this.options.wireguard.dns,
          serverPublicKey: info.publicKey,
          endpoint: `${info.publicIp}:${info.listenPort}`,
          keepalive: this.options.wireguard.keepalive
        });
        if (!isLikelyWireGuardClientConfig(config)) {
          throw new Error('Generated client config is incomplete');
        }

        const configPath = this.artifactPath(name);
        await fs.mkdir(this.options.configDir, { recursive: true });
        await fs.writeFile(configPath, config, { mode: 0o600 });
        logger.info('Client config created', { serverId: server.id, name, address, configPath });
        return configPath;
      });
    });
  }

  async removeClient(server: Server, clientName: string): Promise<void> {
    await this.removePeerAndArtifact(server, clientName, this.artifactPath(clientName));
  }

  async revokeClientConfig(server: Server, configPath: string): Promise<void> {
    const name = clientNameFromConfigPath(configPath);
    await this.removePeerAndArtifact(server, name, configPath);
  }

  /** @returns true, если файл пиров изменился */
  blockClient(server: Server, configPath: string): Promise<boolean> {
    return this.setBlocked(server, configPath, true);
  }

  unblockClient(server: Server, configPath: string): Promise<boolean> {
    return this.setBlocked(server, configPath, false);
  }

  async isClientBlocked(server: Server, configPath: string): Promise<boolean> {
    const name = clientNameFromConfigPath(configPath);
    return this.withHost(server, (session) =>
      new PeerRegistry(session, this.registryPath, this.options.wireguard.subnet).isBlocked(name)
    );
  }

  private async setBlocked(server: Server, configPath: string, blocked: boolean): Promise<boolean> {
    const name = clientNameFromConfigPath(configPath);
    const stageName: ProvisioningStage = blocked ? 'block' : 'unblock';

    const changed = await this.withHost(server, async (session) => {
      const registry = new PeerRegistry(session, this.registryPath, this.options.wireguard.subnet);
      const result = await stage(stageName, () => registry.setBlocked(name, blocked));
      if (!result.found) {
        throw new ProvisioningStageError(stageName, new Error(`Peer "${name}" not found on ${server.ip}`));
      }
      if (result.changed) {
        await stage('restart', () => this.restart(session));
      }
      return result.changed;
    });

    logger.info(blocked ? 'Client blocked' : 'Client unblocked', { serverId: server.id, name, changed });
    return changed;
  }

  private async removePeerAndArtifact(server: Server, name: string, configPath: string): Promise<void> {
    await this.withHost(server, async (session) => {
      const registry = new PeerRegistry(session, this.registryPath, this.options.wireguard.subnet);
      const removed = await stage('remove', () => registry.removePeer(name));
      if (removed) {
        await stage('restart', () => this.restart(session));
      }
    });

    try {
      await fs.unlink(configPath);
    } catch (error) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) throw error;
    }

    logger.info('Client removed', { serverId: server.id, name });
  }

  private async withHost<T>(
    server: Server,
    task: (session: RemoteSession) => Promise<T>,
    open: (target: HostTarget) => Promise<RemoteSession> = (target) =>
      this.connector.connect(target, this.options.connectTimeoutMs)
  ): Promise<T> {
    const target = hostTarget(server);
    return this.locks.runExclusive(`${target.host}:${target.port}`, async () => {
      const session = await open(target);
      try {
        return await task(session);
      } finally {
        session.close();
      }
    });
  }

  private async connectForSetup(target: HostTarget): Promise<RemoteSession> {
    const { setupTimeoutMs } = this.options;
    const address = `${target.host}:${target.port}`;
    // Транспортный таймаут длиннее срока настройки
    const pending = this.connector.connect(target, setupTimeoutMs + this.options.connectTimeoutMs);

    try {
      return await withTimeout(pending, setupTimeoutMs, `Connection to ${address}`);
    } catch (error) {
      if (!(error instanceof TimeoutError)) throw error;

      // Сессия может прийти позже: закрываем её сразу
      void pending.then(
        (late) => late.close(),
        (lateError: unknown) => logger.debug('Late connection attempt failed', { address, error: errorMessage(lateError) })
      );
      throw new ProvisioningError('SETUP_TIMEOUT', `Server setup on ${address} timed out after ${setupTimeoutMs} ms`, {
        cause: error
      });
    }
  }

  private async ensureWireGuardInstalled(session: RemoteSession): Promise<void> {
    if (await commandSucceeds(session, 'command -v wg')) return;

    const osRelease = await stage('install', () => session.run('cat /etc/os-release'));
    const family = classifyOsFamily(osRelease);
    logger.info('WireGuard is not installed, installing', { family });

    let plan: InstallPlan | null = family === 'unknown' ? null : INSTALL_PLANS[family];
    if (!plan) {
      for (const candidate of PROBE_ORDER) {
        if (await commandSucceeds(session, INSTALL_PLANS[candidate].probe)) {
          plan = INSTALL_PLANS[candidate];
          break;
        }
      }
    }
    if (!plan) {
      throw new ProvisioningError('UNSUPPORTED_OS', 'No supported package manager found, install WireGuard manually');
    }

    const selected = plan;
    await stage('install', async () => {
      for (const command of selected.prepare) {
        try {
          await session.run(command);
        } catch (error) {
          logger.warn('Preparation step failed, continuing', { command, error: errorMessage(error) });
        }
      }
      for (const command of selected.install) {
        await session.run(command);
      }
      await session.run('command -v wg');
    });
  }

  private async ensureServerKeys(session: RemoteShell): Promise<ServerKeys> {
    await session.run(`mkdir -p ${WIREGUARD_DIR} && chmod 700 ${WIREGUARD_DIR}`);

    if ((await fileExists(session, PRIVATE_KEY_PATH)) && (await fileExists(session, PUBLIC_KEY_PATH))) {
      const privateKey = (await session.run(`cat ${PRIVATE_KEY_PATH}`)).trim();
      const publicKey = (await session.run(`cat ${PUBLIC_KEY_PATH}`)).trim();
      if (privateKey && publicKey) return { privateKey, publicKey };
    }

    // Файлы ключей потеряны, но конфиг интерфейса остался
    if (await fileExists(session, this.registryPath)) {
      const privateKey = readInterfaceValue(await session.run(`cat ${shellQuote(this.registryPath)}`), 'PrivateKey');
      if (privateKey) {
        const publicKey = await derivePublicKey(session, privateKey);
        await session.writeFile(PRIVATE_KEY_PATH, `${privateKey}\n`);
        await session.writeFile(PUBLIC_KEY_PATH, `${publicKey}\n`);
        await session.run(`chmod 600 ${PRIVATE_KEY_PATH} ${PUBLIC_KEY_PATH}`);
        logger.info('Server keys restored from interface config');
        return { privateKey, publicKey };
      }
    }

    await session.run(`umask 077 && wg genkey | tee ${PRIVATE_KEY_PATH} | wg pubkey > ${PUBLIC_KEY_PATH}`);
    const privateKey = (await session.run(`cat ${PRIVATE_KEY_PATH}`)).trim();
    const publicKey = (await session.run(`cat ${PUBLIC_KEY_PATH}`)).trim();
    if (!privateKey || !publicKey) {
      throw new Error('Server key generation produced an empty key');
    }

    logger.info('Server keys generated');
    return { privateKey, publicKey };
  }

  private async ensureInterfaceConfig(session: RemoteShell, keys: ServerKeys): Promise<void> {
    if (await fileExists(session, this.registryPath)) {
      logger.info('Interface config already exists', { path: this.registryPath });
      return;
    }

    let egressInterface = 'eth0';
    try {
      const detected = (await session.run("ip -o -4 route show to default | awk '{print $5}' | head -1")).trim();
      if (detected) egressInterface = detected;
    } catch (error) {
      logger.warn('Cannot detect default route interface, using eth0', { error: errorMessage(error) });
    }

    const { wireguard } = this.options;
    const registry = new PeerRegistry(session, this.registryPath, wireguard.subnet);
    await registry.commit(
      buildServerInterface({
        privateKey: keys.privateKey,
        address: `${wireguard.subnet}.1`,
        listenPort: wireguard.listenPort,
        interfaceName: wireguard.interfaceName,
        egressInterface
      })
    );
    logger.info('Interface config written', { path: this.registryPath, egressInterface });
  }

  private async readServerInfo(session: RemoteShell, server: Server): Promise<ServerInfo> {
    const { publicKey } = await this.ensureServerKeys(session);

    let publicIp = '';
    for (const command of [PUBLIC_IP_COMMAND, "hostname -I | awk '{print $1}'"]) {
      try {
        const candidate = (await session.run(command)).trim();
        if (IPV4.test(candidate)) {
          publicIp = candidate;
          break;
        }
      } catch (error) {
        logger.debug('Public IP lookup failed', { command, error: errorMessage(error) });
      }
    }

    let listenPort = this.options.wireguard.listenPort;
    try {
      listenPort = readListenPort(await session.run(`cat ${shellQuote(this.registryPath)}`));
    } catch (error) {
      logger.warn('Cannot read listen port, using default', { listenPort, error: errorMessage(error) });
    }

    return { publicKey, publicIp: publicIp || server.ip, listenPort };
  }

  private uniqueName(content: string, clientName: string): string {
    if (!hasPeer(content, clientName)) return clientName;

    for (let suffix = 2; ; suffix++) {
      const candidate = `${clientName}_${suffix}`;
      if (!hasPeer(content, candidate)) return candidate;
    }
  }

  private async restart(session: RemoteShell): Promise<void> {
    await session.run(`systemctl restart ${this.unit}`);
  }
}
