import { HostConnector, HostTarget, RemoteSession } from '../types';
import { CommandFailedError, ProvisioningError } from '../utils/errors';

type Handler = (args: string[], host: FakeHost) => string;

/**
 * Сервер в памяти: файлы в Map и минимальный интерпретатор команд,
 * которые отправляет ProvisioningService.
 */
export class FakeHost implements HostConnector {
  files = new Map<string, string>();
  commands: string[] = [];
  connects: HostTarget[] = [];
  wgInstalled = true;
  packageManager: 'apt-get' | 'yum' | 'pacman' | 'apk' | null = 'apt-get';
  interfaceUp = true;
  publicIp = '198.51.100.7';
  connectError: ProvisioningError | null = null;
  connectDelayMs = 0;
  /** Команды, которые должны завершиться ошибкой */
  failing: RegExp[] = [];
  keygens = 0;
  restarts = 0;
  openSessions = 0;
  maxOpenSessions = 0;
  closedSessions = 0;

  private clientKeys = 0;

  private handlers: Array<[RegExp, Handler]> = [
    [/^command -v wg$/, (_, host) => host.expect(host.wgInstalled, '/usr/bin/wg\n')],
    [/^command -v (\S+)$/, ([tool], host) => host.expect(host.packageManager === tool, `/usr/bin/${tool}\n`)],
    [/^cat '?([^']+?)'?$/, ([file], host) => host.readFile(file)],
    [/^test -f '([^']+)' && echo yes \|\| echo no$/, ([file], host) => (host.files.has(file) ? 'yes\n' : 'no\n')],
    [/^mkdir -p \S+ && chmod 700 \S+$/, () => ''],
    [/^chmod 600 \S+ \S+$/, () => ''],
    [/^chmod 600 '([^']+)' && mv -f '([^']+)' '([^']+)'$/, ([tmp, , target], host) => host.move(tmp, target)],
    [/^umask 077 && wg genkey \| tee (\S+) \| wg pubkey > (\S+)$/, ([priv, pub], host) => host.generateServerKeys(priv, pub)],
    [/^wg genkey$/, (_, host) => `client-private-${++host.clientKeys}\n`],
    [/^printf '%s' '([^']+)' \| wg pubkey$/, ([key]) => `${key.replace('private', 'public')}\n`],
    [/^ip -o -4 route show to default/, () => 'ens3\n'],
    [/^curl /, (_, host) => `${host.publicIp}\n`],
    [/^echo 'net\.ipv4\.ip_forward=1'/, () => ''],
    [/^systemctl enable \S+ && systemctl start \S+$/, () => ''],
    [/^systemctl restart \S+$/, (_, host) => host.restart()],
    [/^ip link show \S+$/, (_, host) => host.expect(host.interfaceUp, '4: wg0: <POINTOPOINT,NOARP,UP,LOWER_UP>\n')],
    [/^(apt-get|DEBIAN_FRONTEND=\S+|yum|pacman|apk) /, (_, host) => host.install()]
  ];

  async connect(target: HostTarget): Promise<RemoteSession> {
    this.connects.push(target);
    if (this.connectDelayMs > 0) {
      await new Promise((resolve) => setTimeout(resolve, this.connectDelayMs));
    }
    if (this.connectError) throw this.connectError;

    this.openSessions++;
    this.maxOpenSessions = Math.max(this.maxOpenSessions, this.openSessions);
    return this.session();
  }

  execute(command: string): string {
    this.commands.push(command);
    if (this.failing.some((pattern) => pattern.test(command))) {
      throw new CommandFailedError(command, 'simulated failure\n', 1);
    }

    for (const [pattern, handler] of this.handlers) {
      const match = pattern.exec(command);
      if (match) return handler(match.slice(1), this);
    }
    throw new Error(`FakeHost: unexpected command ${command}`);
  }

  private session(): RemoteSession {
    let closed = false;
    const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

    return {
      run: async (command) => {
        await tick();
        return this.execute(command);
      },
      writeFile: async (filePath, content) => {
        await tick();
        this.commands.push(`write ${filePath}`);
        this.files.set(filePath, content);
      },
      close: () => {
        if (closed) return;
        closed = true;
        this.openSessions--;
        this.closedSessions++;
      }
    };
  }

  private expect(condition: boolean, stdout: string): string {
    if (!condition) throw new CommandFailedError('probe', '', 1);
    return stdout;
  }

  private readFile(file: string): string {
    const content = this.files.get(file);
    if (content === undefined) {
      throw new CommandFailedError(`cat ${file}`, `cat: ${file}: No such file or directory\n`, 1);
    }
    return content;
  }

  private move(from: string, to: string): string {
    this.files.set(to, this.readFile(from));
    this.files.delete(from);
    return '';
  }

  private generateServerKeys(privatePath: string, publicPath: string): string {
    this.keygens++;
    this.files.set(privatePath, `server-private-${this.keygens}\n`);
    this.files.set(publicPath, `server-public-${this.keygens}\n`);
    return '';
  }

  private restart(): string {
    this.restarts++;
    return '';
  }

  private install(): string {
    if (this.packageManager === null) throw new CommandFailedError('install', 'command not found\n', 127);
    this.wgInstalled = true;
    return '';
  }
}
