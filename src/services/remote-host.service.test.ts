import { EventEmitter } from 'events';
import { Client } from 'ssh2';
import { RemoteHostSession } from './remote-host.service';
import { HostTarget } from '../types';

jest.mock('ssh2', () => ({
  __esModule: true,
  Client: jest.fn()
}));

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  }
}));

type Reply = { stdout?: string; stderr?: string; code: number };
type ConnectOutcome = 'ready' | 'auth' | 'refused' | 'hang';

class FakeChannel extends EventEmitter {
  stderr = new EventEmitter();
  written = '';
  ended = false;

  end(data?: string) {
    if (data !== undefined) this.written += data;
    this.ended = true;
    return this;
  }
}

class FakeClient extends EventEmitter {
  commands: string[] = [];
  channels: FakeChannel[] = [];
  ended = false;
  active = 0;
  maxActive = 0;

  constructor(
    private outcome: ConnectOutcome,
    private respond: (command: string) => Reply
  ) {
    super();
  }

  connect() {
    setImmediate(() => {
      if (this.outcome === 'ready') this.emit('ready');
      if (this.outcome === 'auth') {
        this.emit('error', Object.assign(new Error('All configured authentication methods failed'), { level: 'client-authentication' }));
      }
      if (this.outcome === 'refused') {
        this.emit('error', Object.assign(new Error('connect ECONNREFUSED'), { level: 'client-socket' }));
      }
    });
    return this;
  }

  exec(command: string, callback: (err: Error | undefined, channel: FakeChannel) => void) {
    this.commands.push(command);
    const channel = new FakeChannel();
    this.channels.push(channel);
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    callback(undefined, channel);

    setImmediate(() => {
      const reply = this.respond(command);
      if (reply.stdout) channel.emit('data', Buffer.from(reply.stdout));
      if (reply.stderr) channel.stderr.emit('data', Buffer.from(reply.stderr));
      channel.emit('exit', reply.code);
      this.active--;
      channel.emit('close');
    });
    return this;
  }

  end() {
    this.ended = true;
    return this;
  }
}

const target: HostTarget = { host: '203.0.113.5', port: 22, username: 'deploy', password: 'test-password' };

function install(fake: FakeClient) {
  jest.mocked(Client).mockImplementation(() => fake as unknown as Client);
}

describe('RemoteHostSession', () => {
  afterEach(() => {
    jest.mocked(Client).mockReset();
  });

  test('probes sudo and wraps commands for non-root users', async () => {
    const fake = new FakeClient('ready', (command) =>
      command.includes('os-release') ? { stdout: 'ID=debian\n', code: 0 } : { code: 0 }
    );
    install(fake);

    const session = await RemoteHostSession.connect(target, 1000);
    const out = await session.run('cat /etc/os-release');
    session.close();

    expect(out).toBe('ID=debian\n');
    expect(fake.commands).toEqual(['sudo -n true', "sudo -n sh -c 'cat /etc/os-release'"]);
    expect(fake.ended).toBe(true);
  });

  test('closes stdin of commands that get no input', async () => {
    const fake = new FakeClient('ready', () => ({ code: 0 }));
    install(fake);

    const session = await RemoteHostSession.connect({ ...target, username: 'root' }, 1000);
    await session.run('apt-get install -y wireguard');
    session.close();

    expect(fake.channels.map((channel) => [channel.ended, channel.written])).toEqual([
      [true, ''],
      [true, '']
    ]);
  });

  test('runs commands directly for root', async () => {
    const fake = new FakeClient('ready', () => ({ stdout: 'ok', code: 0 }));
    install(fake);

    const session = await RemoteHostSession.connect({ ...target, username: 'root' }, 1000);
    await session.run("echo 'ok'");
    session.close();

    expect(fake.commands).toEqual(['true', "echo 'ok'"]);
  });

  test('fails with CommandFailed on a non-zero exit', async () => {
    const fake = new FakeClient('ready', (command) =>
      command === 'sudo -n true' ? { code: 0 } : { stderr: 'boom\n', code: 2 }
    );
    install(fake);

    const session = await RemoteHostSession.connect(target, 1000);
    await expect(session.run('systemctl restart wg-quick@wg0')).rejects.toMatchObject({
      code: 'COMMAND_FAILED',
      stderr: 'boom\n',
      exitCode: 2,
      command: 'systemctl restart wg-quick@wg0'
    });
    session.close();
  });

  test('maps authentication errors to AuthFailed', async () => {
    const fake = new FakeClient('auth', () => ({ code: 0 }));
    install(fake);

    await expect(RemoteHostSession.connect(target, 1000)).rejects.toMatchObject({ code: 'AUTH_FAILED' });
    expect(fake.ended).toBe(true);
  });

  test('maps socket errors to Unreachable', async () => {
    install(new FakeClient('refused', () => ({ code: 0 })));

    await expect(RemoteHostSession.connect(target, 1000)).rejects.toMatchObject({ code: 'UNREACHABLE' });
  });

  test('gives up on a host that never answers', async () => {
    const fake = new FakeClient('hang', () => ({ code: 0 }));
    install(fake);

    await expect(RemoteHostSession.connect(target, 20)).rejects.toMatchObject({
      code: 'UNREACHABLE',
      message: 'Timed out connecting to 203.0.113.5:22 after 20 ms'
    });
    expect(fake.ended).toBe(true);
  });

  test('rejects a user without passwordless sudo', async () => {
    const fake = new FakeClient('ready', () => ({ stderr: 'sudo: a password is required\n', code: 1 }));
    install(fake);

    await expect(RemoteHostSession.connect(target, 1000)).rejects.toMatchObject({ code: 'PRIVILEGE_DENIED' });
    expect(fake.ended).toBe(true);
  });

  test('streams file content through a piped write', async () => {
    const fake = new FakeClient('ready', () => ({ code: 0 }));
    install(fake);

    const session = await RemoteHostSession.connect(target, 1000);
    await session.writeFile('/etc/wireguard/wg0.conf.tmp', '[Interface]\n');
    session.close();

    expect(fake.commands[1]).toBe("sudo -n tee '/etc/wireguard/wg0.conf.tmp' > /dev/null");
    expect(fake.channels[1].written).toBe('[Interface]\n');
  });

  test('never runs two commands at once', async () => {
    const fake = new FakeClient('ready', () => ({ stdout: 'x', code: 0 }));
    install(fake);

    const session = await RemoteHostSession.connect(target, 1000);
    await Promise.all([session.run('a'), session.run('b'), session.writeFile('/tmp/c', 'c')]);
    session.close();

    expect(fake.maxActive).toBe(1);
    expect(fake.commands).toHaveLength(4);
  });

  test('refuses commands after close', async () => {
    install(new FakeClient('ready', () => ({ code: 0 })));

    const session = await RemoteHostSession.connect(target, 1000);
    session.close();
    await expect(session.run('true')).rejects.toMatchObject({ code: 'UNREACHABLE' });
  });
});
