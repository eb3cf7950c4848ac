import { PurchaseService } from './purchase.service';
import { DatabaseService } from './database.service';
import { ClientProvisioner, PaymentRefunder, Server } from '../types';
import { ProvisioningStageError } from '../utils/errors';
import { DAY_MS } from '../utils/subscription-status';

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  }
}));

const NOW = new Date('2024-05-10T12:00:00Z');

describe('PurchaseService', () => {
  let db: DatabaseService;
  let provisioning: jest.Mocked<ClientProvisioner>;
  let refunder: jest.Mocked<PaymentRefunder>;
  let service: PurchaseService;

  beforeEach(() => {
    db = new DatabaseService(':memory:');
    provisioning = {
      setupServer: jest.fn().mockResolvedValue(undefined),
      createClientConfig: jest.fn((_server: Server, name: string) => Promise.resolve(`/var/lib/vpn/${name}.conf`)),
      revokeClientConfig: jest.fn().mockResolvedValue(undefined),
      blockClient: jest.fn(),
      unblockClient: jest.fn(),
      isClientBlocked: jest.fn()
    };
    refunder = { refund: jest.fn().mockResolvedValue(undefined) };
    service = new PurchaseService(db, provisioning, refunder, () => NOW);
  });

  afterEach(() => {
    db.close();
  });

  function addServer(maxClients: number) {
    return db.addServer({ ip: '203.0.113.10', port: 22, sshUser: 'root', sshPassword: 'test-password', maxClients });
  }

  test('provisions a config and stores the subscription with its payment', async () => {
    const server = addServer(5);
    const user = db.upsertUser({ telegramId: 501, username: 'alice' });

    const result = await service.purchase(user, 1, { chargeId: 'charge-1', amount: 299 });

    expect(provisioning.setupServer).toHaveBeenCalledWith(expect.objectContaining({ id: server.id }));
    expect(provisioning.createClientConfig).toHaveBeenCalledWith(expect.objectContaining({ id: server.id }), `user_${user.id}`);
    expect(result.configPath).toBe(`/var/lib/vpn/user_${user.id}.conf`);
    expect(result.subscription).toMatchObject({
      userId: user.id,
      serverId: server.id,
      planId: 1,
      status: 'active',
      startDate: NOW,
      endDate: new Date(NOW.getTime() + 30 * DAY_MS)
    });
    expect(db.getServerById(server.id).currentClients).toBe(1);
    expect(db.getPaymentsByUserId(user.id)).toEqual([
      expect.objectContaining({ subscriptionId: result.subscription.id, amount: 299, status: 'completed' })
    ]);
  });

  test('releases the slot and refunds when provisioning fails', async () => {
    const server = addServer(5);
    const user = db.upsertUser({ telegramId: 501 });
    const failure = new ProvisioningStageError('restart', new Error('Job for wg-quick@wg0.service failed'));
    provisioning.createClientConfig.mockRejectedValue(failure);

    await expect(service.purchase(user, 1, { chargeId: 'charge-2', amount: 299 })).rejects.toBe(failure);

    expect(db.getServerById(server.id).currentClients).toBe(0);
    expect(db.getSubscriptionsByUserId(user.id)).toEqual([]);
    expect(refunder.refund).toHaveBeenCalledWith(501, 'charge-2');
    expect(db.getPaymentsByUserId(user.id)).toEqual([
      expect.objectContaining({ subscriptionId: null, paymentId: 'charge-2', status: 'refunded' })
    ]);
    expect(provisioning.revokeClientConfig).not.toHaveBeenCalled();
  });

  test('records a failed payment when the refund fails too', async () => {
    const user = db.upsertUser({ telegramId: 501 });
    refunder.refund.mockRejectedValue(new Error('Bad Request: CHARGE_ALREADY_REFUNDED'));

    await expect(service.purchase(user, 1, { chargeId: 'charge-3', amount: 299 })).rejects.toMatchObject({
      reason: 'NO_CAPACITY'
    });
    expect(db.getPaymentsByUserId(user.id)).toEqual([expect.objectContaining({ status: 'failed' })]);
  });

  test('gives the last slot to only one of two concurrent purchases', async () => {
    addServer(1);
    const first = db.upsertUser({ telegramId: 501 });
    const second = db.upsertUser({ telegramId: 502 });

    const results = await Promise.allSettled([
      service.purchase(first, 1, { chargeId: 'charge-a', amount: 299 }),
      service.purchase(second, 1, { chargeId: 'charge-b', amount: 299 })
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect(provisioning.createClientConfig).toHaveBeenCalledTimes(1);
    expect(refunder.refund).toHaveBeenCalledWith(502, 'charge-b');
  });

  test('rejects unknown plans without reserving a slot', async () => {
    const server = addServer(1);
    const user = db.upsertUser({ telegramId: 501 });

    await expect(service.purchase(user, 99, { chargeId: 'charge-4', amount: 1 })).rejects.toMatchObject({
      reason: 'PLAN_UNAVAILABLE'
    });
    expect(db.getServerById(server.id).currentClients).toBe(0);
  });
});
