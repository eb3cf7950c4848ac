import { Context } from 'grammy';
import { AdminHandler } from './admin.handler';
import { DatabaseService } from '../services/database.service';
import { ClientProvisioner, Server, Subscription } from '../types';
import { ProvisioningStageError } from '../utils/errors';

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  }
}));

const ADMIN_ID = 101;

function makeCtx(text: string, fromId = ADMIN_ID) {
  const reply = jest.fn().mockResolvedValue({ message_id: 10 });
  const deleteMessage = jest.fn().mockResolvedValue(true);
  const sendMessage = jest.fn().mockResolvedValue({ message_id: 11 });
  const ctx = {
    from: { id: fromId, username: 'admin', first_name: 'Admin' },
    chat: { id: 100 },
    message: { text },
    reply,
    deleteMessage,
    api: { sendMessage }
  } as unknown as Context;
  return { ctx, reply, deleteMessage, sendMessage };
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('AdminHandler', () => {
  let db: DatabaseService;
  let provisioning: jest.Mocked<ClientProvisioner>;
  let handler: AdminHandler;
  let server: Server;
  let subscription: Subscription;

  beforeEach(() => {
    db = new DatabaseService(':memory:');
    provisioning = {
      setupServer: jest.fn().mockResolvedValue(undefined),
      createClientConfig: jest.fn(),
      revokeClientConfig: jest.fn().mockResolvedValue(undefined),
      blockClient: jest.fn().mockResolvedValue(true),
      unblockClient: jest.fn().mockResolvedValue(true),
      isClientBlocked: jest.fn().mockResolvedValue(false)
    };
    handler = new AdminHandler(db, provisioning, [ADMIN_ID], 1000);

    db.addServer({ ip: '203.0.113.10', port: 22, sshUser: 'root', sshPassword: 'test-password', maxClients: 5 });
    const reserved = db.reserveServerSlot();
    if (!reserved) throw new Error('no slot');
    server = reserved;

    const user = db.upsertUser({ telegramId: 501, username: 'alice' });
    subscription = db.addSubscription({
      userId: user.id,
      serverId: server.id,
      planId: 1,
      startDate: new Date('2024-05-01T00:00:00Z'),
      endDate: new Date('2024-05-31T00:00:00Z'),
      status: 'active',
      configFilePath: '/var/lib/vpn/user_1.conf'
    });
  });

  afterEach(() => {
    db.close();
  });

  it('refuses admin commands to other users', async () => {
    const { ctx, reply } = makeCtx('/servers', 999);

    await handler.handleServers(ctx);

    expect(reply).toHaveBeenCalledWith('⛔ Эта команда доступна только администраторам.');
  });

  it('lists servers with their load', async () => {
    const { ctx, reply } = makeCtx('/servers');

    await handler.handleServers(ctx);

    expect(reply).toHaveBeenCalledWith(
      '🖥 <b>Серверы (1):</b>\n\n#1 🟢 <code>203.0.113.10:22</code>\n   Пользователь: root, клиентов: 1/5',
      { parse_mode: 'HTML' }
    );
  });

  it('adds a server through the dialog and deletes the password message', async () => {
    await handler.handleAddServer(makeCtx('/addserver').ctx);

    for (const text of ['198.51.100.20', '2222', 'deploy']) {
      expect(await handler.handleDialogText(makeCtx(text).ctx)).toBe(true);
    }
    const passwordStep = makeCtx('test-password');
    expect(await handler.handleDialogText(passwordStep.ctx)).toBe(true);
    expect(passwordStep.deleteMessage).toHaveBeenCalled();

    const last = makeCtx('20');
    expect(await handler.handleDialogText(last.ctx)).toBe(true);

    expect(db.getServerById(2)).toMatchObject({
      ip: '198.51.100.20',
      port: 2222,
      sshUser: 'deploy',
      sshPassword: 'test-password',
      maxClients: 20,
      currentClients: 0
    });
    expect(last.reply).toHaveBeenCalledWith(
      '✅ Сервер #2 добавлен: <code>198.51.100.20:2222</code>\n\nЗапустите настройку командой /setupserver 2',
      { parse_mode: 'HTML' }
    );
    expect(await handler.handleDialogText(makeCtx('anything').ctx)).toBe(false);
  });

  it('keeps asking for the port until it is valid', async () => {
    await handler.handleAddServer(makeCtx('/addserver').ctx);
    await handler.handleDialogText(makeCtx('198.51.100.20').ctx);

    const bad = makeCtx('70000');
    await handler.handleDialogText(bad.ctx);
    expect(bad.reply).toHaveBeenCalledWith('❌ Порт должен быть числом от 1 до 65535.');

    const good = makeCtx('22');
    await handler.handleDialogText(good.ctx);
    expect(good.reply).toHaveBeenCalledWith('Введите имя SSH-пользователя:');
  });

  it('cancels the dialog', async () => {
    await handler.handleAddServer(makeCtx('/addserver').ctx);

    const cancel = makeCtx('/cancel');
    await handler.handleCancel(cancel.ctx);

    expect(cancel.reply).toHaveBeenCalledWith('❎ Действие отменено.');
    expect(await handler.handleDialogText(makeCtx('198.51.100.20').ctx)).toBe(false);
  });

  it('ignores dialog text from users without a session', async () => {
    expect(await handler.handleDialogText(makeCtx('hello').ctx)).toBe(false);
  });

  it('reports setup failures with the failing stage', async () => {
    provisioning.setupServer.mockRejectedValue(new ProvisioningStageError('install', new Error('E: Unable to locate package')));
    const { ctx, reply } = makeCtx('/setupserver 1');

    await handler.handleSetupServer(ctx);

    expect(reply).toHaveBeenNthCalledWith(1, '⏳ Настраиваю сервер #1...');
    expect(reply).toHaveBeenLastCalledWith(expect.stringMatching(/^❌ Не удалось настроить сервер #1: /), {
      parse_mode: 'HTML'
    });
  });

  it('answers with usage when the id is missing', async () => {
    const { ctx, reply } = makeCtx('/setupserver abc');

    await handler.handleSetupServer(ctx);

    expect(reply).toHaveBeenCalledWith('Использование: /setupserver <id сервера>');
    expect(provisioning.setupServer).not.toHaveBeenCalled();
  });

  it('reports unknown subscriptions', async () => {
    const { ctx, reply } = makeCtx('/block 42');

    await handler.handleBlock(ctx);

    expect(reply).toHaveBeenCalledWith('❌ Не найдено: Subscription #42 not found');
    expect(provisioning.blockClient).not.toHaveBeenCalled();
  });

  it('blocks and unblocks a subscription', async () => {
    const block = makeCtx(`/block ${subscription.id}`);
    await handler.handleBlock(block.ctx);

    expect(provisioning.blockClient).toHaveBeenCalledWith(
      expect.objectContaining({ id: server.id }),
      '/var/lib/vpn/user_1.conf'
    );
    expect(block.reply).toHaveBeenCalledWith(`✅ Подписка #${subscription.id} заблокирована.`, { parse_mode: 'HTML' });
    expect(db.getSubscriptionById(subscription.id).status).toBe('blocked');

    const unblock = makeCtx(`/unblock ${subscription.id}`);
    await handler.handleUnblock(unblock.ctx);

    expect(unblock.reply).toHaveBeenCalledWith(`✅ Подписка #${subscription.id} разблокирована.`, {
      parse_mode: 'HTML'
    });
    expect(db.getSubscriptionById(subscription.id).status).toBe('active');
  });

  it('does not unblock an expired subscription', async () => {
    db.updateSubscription({ ...subscription, status: 'expired' });
    const { ctx, reply } = makeCtx(`/unblock ${subscription.id}`);

    await handler.handleUnblock(ctx);

    expect(reply).toHaveBeenCalledWith('❌ Подписку со статусом «истекла» нельзя разблокировать.');
    expect(provisioning.unblockClient).not.toHaveBeenCalled();
  });

  it('marks a subscription revoked even when the server cannot be reached', async () => {
    provisioning.revokeClientConfig.mockRejectedValue(new Error('connect ECONNREFUSED'));
    const { ctx, reply } = makeCtx(`/revoke ${subscription.id}`);

    await handler.handleRevoke(ctx);

    expect(db.getSubscriptionById(subscription.id).status).toBe('revoked');
    expect(db.getServerById(server.id).currentClients).toBe(1);
    expect(reply).toHaveBeenCalledWith(
      `⚠️ Подписка #${subscription.id} отмечена как отозванная, но удалить конфиг с сервера не удалось: connect ECONNREFUSED`,
      { parse_mode: 'HTML' }
    );
  });

  it('shows the live peer state of a subscription', async () => {
    provisioning.isClientBlocked.mockResolvedValue(true);
    const { ctx, reply } = makeCtx(`/sub ${subscription.id}`);

    await handler.handleSubscription(ctx);

    expect(reply).toHaveBeenNthCalledWith(1, expect.stringContaining('Пользователь: @alice (501)'), {
      parse_mode: 'HTML'
    });
    expect(reply).toHaveBeenNthCalledWith(1, expect.stringContaining('Тариф: Базовый'), { parse_mode: 'HTML' });
    expect(reply).toHaveBeenLastCalledWith('🔴 На сервере пир заблокирован.', { parse_mode: 'HTML' });
  });

  it('sends the result of a slow operation as a follow-up message', async () => {
    handler = new AdminHandler(db, provisioning, [ADMIN_ID], 20);
    const pending = deferred<void>();
    provisioning.revokeClientConfig.mockReturnValue(pending.promise);
    const { ctx, reply, sendMessage } = makeCtx(`/revoke ${subscription.id}`);

    await handler.handleRevoke(ctx);

    expect(reply).toHaveBeenCalledWith(
      `⏳ Отзыв подписки #${subscription.id} ещё выполняется (дольше 1 с). Результат пришлю отдельным сообщением.`
    );
    expect(sendMessage).not.toHaveBeenCalled();
    expect(db.getServerById(server.id).currentClients).toBe(1);

    pending.resolve();
    await new Promise((resolve) => setTimeout(resolve, 0));

    expect(sendMessage).toHaveBeenCalledWith(
      100,
      `✅ Подписка #${subscription.id} отозвана, конфиг удалён с сервера.`,
      { parse_mode: 'HTML' }
    );
    expect(db.getServerById(server.id).currentClients).toBe(0);
  });
});
