import { Client, ClientChannel } from 'ssh2';
import { HostConnector, HostTarget, RemoteSession } from '../types';
import { CommandFailedError, ProvisioningError, errorMessage } from '../utils/errors';
import { elevate, shellQuote } from '../utils/shell';
import logger from '../utils/logger';

interface ExecResult {
  stdout: string;
  stderr: string;
  exitCode: number | null;
}

/**
 * SSH-сессия к одному серверу. Команды выполняются по одной: каждый вызов
 * встаёт в очередь за предыдущим. Для пользователя, отличного от root,
 * команды запускаются через `sudo -n`.
 */
export class RemoteHostSession implements RemoteSession {
  private queue: Promise<unknown> = Promise.resolve();
  private closed = false;
  private readonly elevated: boolean;

  private constructor(
    private client: Client,
    readonly target: HostTarget
  ) {
    this.elevated = target.username !== 'root';
  }

  static async connect(target: HostTarget, timeoutMs: number): Promise<RemoteHostSession> {
    const address = `${target.host}:${target.port}`;
    logger.info('Connecting to host', { address, username: target.username });

    const client = await openClient(target, timeoutMs);
    const session = new RemoteHostSession(client, target);

    // Проверяем, что sudo работает без пароля
    try {
      const probe = await session.exec(session.elevated ? 'sudo -n true' : 'true');
      if (probe.exitCode !== 0) {
        throw new ProvisioningError(
          'PRIVILEGE_DENIED',
          `User ${target.username} cannot run sudo without a password on ${address}: ${probe.stderr.trim()}`
        );
      }
    } catch (error) {
      session.close();
      if (error instanceof ProvisioningError) throw error;
      throw new ProvisioningError('PRIVILEGE_DENIED', `Privilege probe failed on ${address}: ${errorMessage(error)}`, {
        cause: error
      });
    }

    logger.info('Host session established', { address });
    return session;
  }

  run(command: string): Promise<string> {
    return this.enqueue(async () => {
      const result = await this.exec(this.elevated ? elevate(command) : command);
      if (result.exitCode !== 0) {
        throw new CommandFailedError(command, result.stderr, result.exitCode);
      }
      return result.stdout;
    });
  }

  writeFile(path: string, content: string): Promise<void> {
    const command = this.elevated
      ? `sudo -n tee ${shellQuote(path)} > /dev/null`
      : `cat > ${shellQuote(path)}`;

    return this.enqueue(async () => {
      const result = await this.exec(command, content);
      if (result.exitCode !== 0) {
        throw new CommandFailedError(command, result.stderr, result.exitCode);
      }
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.client.end();
    logger.debug('Host session closed', { address: `${this.target.host}:${this.target.port}` });
  }

  private enqueue<T>(task: () => Promise<T>): Promise<T> {
    const next = this.queue.then(task, task);
    this.queue = next.catch(() => undefined);
    return next;
  }

  private exec(command: string, stdin?: string): Promise<ExecResult> {
    if (this.closed) {
      return Promise.reject(new ProvisioningError('UNREACHABLE', 'Session is already closed'));
    }

    return new Promise<ExecResult>((resolve, reject) => {
      this.client.exec(command, (err: Error | undefined, stream: ClientChannel) => {
        if (err) {
          reject(new ProvisioningError('UNREACHABLE', `Failed to open channel: ${err.message}`, { cause: err }));
          return;
        }

        let stdout = '';
        let stderr = '';
        let exitCode: number | null = null;

        stream.on('data', (chunk: Buffer | string) => {
          stdout += chunk.toString();
        });
        stream.stderr.on('data', (chunk: Buffer | string) => {
          stderr += chunk.toString();
        });
        stream.on('exit', (code: unknown) => {
          if (typeof code === 'number') exitCode = code;
        });
        stream.on('close', () => resolve({ stdout, stderr, exitCode }));

        // Без входных данных stdin закрывается сразу
        if (stdin !== undefined) {
          stream.end(stdin);
        } else {
          stream.end();
        }
      });
    });
  }
}

function openClient(target: HostTarget, timeoutMs: number): Promise<Client> {
  const address = `${target.host}:${target.port}`;

  return new Promise<Client>((resolve, reject) => {
    const client = new Client();
    let settled = false;

    const settle = (error: ProvisioningError | null) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      if (error) {
        client.end();
        reject(error);
      } else {
        resolve(client);
      }
    };

    const timer = setTimeout(() => {
      logger.warn('Connection attempt timed out', { address, timeoutMs });
      settle(new ProvisioningError('UNREACHABLE', `Timed out connecting to ${address} after ${timeoutMs} ms`));
    }, timeoutMs);

    client.once('ready', () => settle(null));
    client.on('error', (err: Error & { level?: string }) => {
      if (settled) {
        logger.warn('SSH connection error', { address, error: err.message });
        return;
      }
      if (err.level === 'client-authentication') {
        settle(new ProvisioningError('AUTH_FAILED', `Authentication failed for ${target.username}@${address}`, { cause: err }));
      } else {
        settle(new ProvisioningError('UNREACHABLE', `Cannot reach ${address}: ${err.message}`, { cause: err }));
      }
    });

    client.connect({
      host: target.host,
      port: target.port,
      username: target.username,
      password: target.password,
      readyTimeout: timeoutMs,
      hostVerifier: () => true
    });
  });
}

export class SshConnector implements HostConnector {
  connect(target: HostTarget, timeoutMs: number): Promise<RemoteSession> {
    return RemoteHostSession.connect(target, timeoutMs);
  }
}
