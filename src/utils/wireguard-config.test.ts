import { buildClientConfig, buildServerInterface, isLikelyWireGuardClientConfig } from './wireguard-config';

describe('wireguard-config', () => {
  const client = buildClientConfig({
    privateKey: 'client-private',
    address: '10.0.0.7',
    dns: '8.8.8.8, 1.1.1.1',
    serverPublicKey: 'server-public',
    endpoint: '203.0.113.10:51820',
    keepalive: 25
  });

  test('renders the client artifact in WireGuard format', () => {
    expect(client).toBe(
      '[Interface]\n' +
        'PrivateKey = client-private\n' +
        'Address = 10.0.0.7/32\n' +
        'DNS = 8.8.8.8, 1.1.1.1\n' +
        '\n' +
        '[Peer]\n' +
        'PublicKey = server-public\n' +
        'AllowedIPs = 0.0.0.0/0\n' +
        'Endpoint = 203.0.113.10:51820\n' +
        'PersistentKeepalive = 25\n'
    );
  });

  test('drops a mask passed with the client address', () => {
    const cfg = buildClientConfig({
      privateKey: 'p',
      address: '10.0.0.9/32',
      dns: '1.1.1.1',
      serverPublicKey: 's',
      endpoint: 'h:1',
      keepalive: 25
    });
    expect(cfg).toContain('Address = 10.0.0.9/32\n');
  });

  test('detects client config', () => {
    expect(isLikelyWireGuardClientConfig(client)).toBe(true);
  });

  test('rejects config without endpoint', () => {
    const cfg = '[Interface]\nPrivateKey = x\nAddress = 10.0.0.2/32\n\n[Peer]\nPublicKey = y\nAllowedIPs = 0.0.0.0/0\n';
    expect(isLikelyWireGuardClientConfig(cfg)).toBe(false);
  });

  test('rejects server-like config', () => {
    const server = buildServerInterface({
      privateKey: 'x',
      address: '10.0.0.1',
      listenPort: 51820,
      interfaceName: 'wg0',
      egressInterface: 'eth0'
    });
    expect(isLikelyWireGuardClientConfig(server)).toBe(false);
    expect(server).toContain('Address = 10.0.0.1/24\n');
    expect(server).toContain('iptables -t nat -A POSTROUTING -o eth0 -j MASQUERADE');
  });
});
