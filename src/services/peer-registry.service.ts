import { RemoteShell } from '../types';
import { errorMessage } from '../utils/errors';
import logger from '../utils/logger';
import {
  appendPeer,
  firstClientAddress,
  hasPeer,
  isPeerBlocked,
  nextFreeAddress,
  removePeer,
  setPeerBlocked,
  BlockResult,
  NewPeer
} from '../utils/peer-registry';
import { shellQuote } from '../utils/shell';

/**
 * Файл пиров на удалённом сервере. Любое изменение переписывает файл
 * целиком через временный файл и `mv`.
 */
export class PeerRegistry {
  constructor(
    private shell: RemoteShell,
    readonly path: string,
    private subnet: string
  ) {}

  read(): Promise<string> {
    return this.shell.run(`cat ${shellQuote(this.path)}`);
  }

  async nextFreeAddress(): Promise<string> {
    let content: string;
    try {
      content = await this.read();
    } catch (error) {
      logger.warn('Cannot read peer registry, using first client address', {
        path: this.path,
        error: errorMessage(error)
      });
      return firstClientAddress(this.subnet);
    }
    return nextFreeAddress(content, this.subnet);
  }

  async hasPeer(name: string): Promise<boolean> {
    return hasPeer(await this.read(), name);
  }

  async isBlocked(name: string): Promise<boolean> {
    return isPeerBlocked(await this.read(), name);
  }

  async appendPeer(peer: NewPeer): Promise<void> {
    const content = await this.read();
    await this.commit(appendPeer(content, peer));
    logger.info('Peer appended', { path: this.path, name: peer.name, address: peer.address });
  }

  /** @returns false, если пира с таким именем не было */
  async removePeer(name: string): Promise<boolean> {
    const content = await this.read();
    const updated = removePeer(content, name);
    if (updated === content) {
      logger.info('Peer not found in registry, nothing to remove', { path: this.path, name });
      return false;
    }

    await this.commit(updated);
    logger.info('Peer removed', { path: this.path, name });
    return true;
  }

  async setBlocked(name: string, blocked: boolean): Promise<BlockResult> {
    const content = await this.read();
    const result = setPeerBlocked(content, name, blocked);
    if (result.changed) {
      await this.commit(result.content);
      logger.info(blocked ? 'Peer blocked' : 'Peer unblocked', { path: this.path, name });
    }
    return result;
  }

  async commit(content: string): Promise<void> {
    const tmp = `${this.path}.tmp-${Date.now()}`;
    await this.shell.writeFile(tmp, content);
    await this.shell.run(`chmod 600 ${shellQuote(tmp)} && mv -f ${shellQuote(tmp)} ${shellQuote(this.path)}`);
  }
}
