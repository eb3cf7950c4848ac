/**
 * Текстовые операции над файлом интерфейса WireGuard (/etc/wireguard/wg0.conf).
 *
 * Пир хранится блоком из четырёх строк:
 *
 *   # <name>
 *   [Peer]
 *   PublicKey = <key>
 *   AllowedIPs = <address>/32
 *
 * Заблокированный пир остаётся в файле: строка имени превращается в
 * `#BLOCKED <name>`, а три строки секции комментируются одним `#`.
 * Этот формат читают и другие утилиты, менять его нельзя.
 */

export const BLOCKED_MARKER = '#BLOCKED ';
const NAME_MARKER = '# ';
const PEER_HEADER = '[Peer]';

export const DEFAULT_LISTEN_PORT = 51820;

export interface PeerBlock {
  name: string;
  blocked: boolean;
  publicKey: string;
  address: string;
  /** Индекс строки с именем */
  start: number;
  /** Индекс строки после блока */
  end: number;
}

export interface NewPeer {
  name: string;
  publicKey: string;
  address: string;
}

export interface BlockResult {
  content: string;
  found: boolean;
  changed: boolean;
}

function parseNameLine(line: string): { name: string; blocked: boolean } | null {
  if (line.startsWith(BLOCKED_MARKER)) {
    const name = line.slice(BLOCKED_MARKER.length);
    return name ? { name, blocked: true } : null;
  }
  if (line.startsWith(NAME_MARKER)) {
    const name = line.slice(NAME_MARKER.length);
    return name ? { name, blocked: false } : null;
  }
  return null;
}

function matchKey(line: string | undefined, prefix: string, key: string): string | null {
  if (line === undefined || !line.startsWith(prefix)) return null;
  const match = new RegExp(`^${key}\\s*=\\s*(.*)$`).exec(line.slice(prefix.length));
  return match ? match[1].trim() : null;
}

export function parsePeerBlocks(content: string): PeerBlock[] {
  const lines = content.split('\n');
  const blocks: PeerBlock[] = [];

  for (let i = 0; i < lines.length; i++) {
    const marker = parseNameLine(lines[i]);
    if (!marker) continue;

    const prefix = marker.blocked ? '#' : '';
    if (lines[i + 1] !== `${prefix}${PEER_HEADER}`) continue;

    let end = i + 2;
    const publicKey = matchKey(lines[end], prefix, 'PublicKey');
    if (publicKey !== null) end++;
    const address = matchKey(lines[end], prefix, 'AllowedIPs');
    if (address !== null) end++;

    blocks.push({
      name: marker.name,
      blocked: marker.blocked,
      publicKey: publicKey ?? '',
      address: address ?? '',
      start: i,
      end
    });
    i = end - 1;
  }

  return blocks;
}

export function hasPeer(content: string, name: string): boolean {
  return parsePeerBlocks(content).some((block) => block.name === name);
}

export function isPeerBlocked(content: string, name: string): boolean {
  return content.split('\n').some((line) => line === `${BLOCKED_MARKER}${name}`);
}

export function appendPeer(content: string, peer: NewPeer): string {
  const base = content === '' || content.endsWith('\n') ? content : `${content}\n`;
  const address = peer.address.includes('/') ? peer.address : `${peer.address}/32`;

  return `${base}\n${NAME_MARKER}${peer.name}\n${PEER_HEADER}\nPublicKey = ${peer.publicKey}\nAllowedIPs = ${address}\n`;
}

/** Удаляет все блоки с этим именем вместе с пустой строкой-разделителем перед ними */
export function removePeer(content: string, name: string): string {
  const blocks = parsePeerBlocks(content).filter((block) => block.name === name);
  if (blocks.length === 0) return content;

  const lines = content.split('\n');
  for (const block of [...blocks].reverse()) {
    const start = block.start > 0 && lines[block.start - 1] === '' ? block.start - 1 : block.start;
    lines.splice(start, block.end - start);
  }
  return lines.join('\n');
}

export function setPeerBlocked(content: string, name: string, blocked: boolean): BlockResult {
  const blocks = parsePeerBlocks(content).filter((block) => block.name === name);
  if (blocks.length === 0) return { content, found: false, changed: false };

  const lines = content.split('\n');
  let changed = false;

  for (const block of blocks) {
    if (block.blocked === blocked) continue;

    lines[block.start] = blocked ? `${BLOCKED_MARKER}${name}` : `${NAME_MARKER}${name}`;
    for (let i = block.start + 1; i < block.end; i++) {
      lines[i] = blocked ? `#${lines[i]}` : lines[i].slice(1);
    }
    changed = true;
  }

  return { content: changed ? lines.join('\n') : content, found: true, changed };
}

export function firstClientAddress(subnet: string): string {
  return `${subnet}.2`;
}

/**
 * Следующий свободный адрес: max(последних октетов ∪ {1}) + 1.
 * Учитываются и закомментированные AllowedIPs, чтобы адрес
 * заблокированного пира не выдавался повторно.
 */
export function nextFreeAddress(content: string, subnet: string): string {
  let max = 1;

  for (const raw of content.split('\n')) {
    const match = /^#?\s*AllowedIPs\s*=\s*(.+)$/.exec(raw.trim());
    if (!match) continue;

    for (const entry of match[1].split(',')) {
      const [ip, mask] = entry.trim().split('/');
      if (mask !== undefined && mask !== '32') continue;

      const octets = ip.split('.');
      if (octets.length !== 4 || octets.slice(0, 3).join('.') !== subnet) continue;

      const last = Number(octets[3]);
      if (Number.isInteger(last) && last > max) max = last;
    }
  }

  const next = max + 1;
  if (next > 254) {
    throw new Error(`No free addresses left in ${subnet}.0/24`);
  }
  return `${subnet}.${next}`;
}

/** Значение ключа из секции [Interface] */
export function readInterfaceValue(content: string, key: string): string | null {
  let inInterface = false;

  for (const raw of content.split('\n')) {
    const line = raw.trim();
    if (/^\[.+\]$/.test(line)) {
      inInterface = line === '[Interface]';
      continue;
    }
    if (!inInterface) continue;

    const value = matchKey(line, '', key);
    if (value !== null) return value;
  }

  return null;
}

export function readListenPort(content: string): number {
  const port = Number(readInterfaceValue(content, 'ListenPort'));
  return Number.isInteger(port) && port > 0 ? port : DEFAULT_LISTEN_PORT;
}
