type ClientConfigOptions = {
  privateKey: string;
  address: string;
  dns: string;
  serverPublicKey: string;
  endpoint: string;
  keepalive: number;
};

type ServerInterfaceOptions = {
  privateKey: string;
  address: string;
  listenPort: number;
  interfaceName: string;
  egressInterface: string;
};

export const FULL_TUNNEL_ALLOWED_IPS = '0.0.0.0/0';

const CLIENT_REQUIRED_MARKERS = ['[Interface]', '[Peer]'] as const;

export function isLikelyWireGuardClientConfig(config: string): boolean {
  if (!config) return false;

  for (const marker of CLIENT_REQUIRED_MARKERS) {
    if (!config.includes(marker)) return false;
  }

  const hasInterfacePrivateKey = /\[Interface\][\s\S]*?\n\s*PrivateKey\s*=\s*\S/.test(config);
  const hasPeerPublicKey = /\[Peer\][\s\S]*?\n\s*PublicKey\s*=\s*\S/.test(config);
  const hasEndpoint = /\[Peer\][\s\S]*?\n\s*Endpoint\s*=\s*\S+:\d+/.test(config);

  if (!hasInterfacePrivateKey || !hasPeerPublicKey || !hasEndpoint) return false;

  const looksLikeServerConfig =
    /\n\s*ListenPort\s*=/.test(config) ||
    /\n\s*PostUp\s*=/.test(config) ||
    /\n\s*PostDown\s*=/.test(config) ||
    /\n\s*SaveConfig\s*=/.test(config);

  return !looksLikeServerConfig;
}

/** Клиентский .conf: весь трафик через туннель */
export function buildClientConfig(options: ClientConfigOptions): string {
  const address = options.address.split('/')[0];

  return [
    '[Interface]',
    `PrivateKey = ${options.privateKey}`,
    `Address = ${address}/32`,
    `DNS = ${options.dns}`,
    '',
    '[Peer]',
    `PublicKey = ${options.serverPublicKey}`,
    `AllowedIPs = ${FULL_TUNNEL_ALLOWED_IPS}`,
    `Endpoint = ${options.endpoint}`,
    `PersistentKeepalive = ${options.keepalive}`,
    ''
  ].join('\n');
}

export function buildServerInterface(options: ServerInterfaceOptions): string {
  const { interfaceName, egressInterface } = options;

  return [
    '[Interface]',
    `PrivateKey = ${options.privateKey}`,
    `Address = ${options.address}/24`,
    `ListenPort = ${options.listenPort}`,
    `PostUp = iptables -A FORWARD -i ${interfaceName} -j ACCEPT; iptables -t nat -A POSTROUTING -o ${egressInterface} -j MASQUERADE`,
    `PostDown = iptables -D FORWARD -i ${interfaceName} -j ACCEPT; iptables -t nat -D POSTROUTING -o ${egressInterface} -j MASQUERADE`,
    ''
  ].join('\n');
}
