import QRCode from 'qrcode';
import { describeError } from './errors';
import logger from './logger';

/** Размер PNG с QR-кодом клиентского конфига */
export const QR_WIDTH = 512;

export class QRCodeGenerator {
  /** PNG с конфигом WireGuard или null, если конфиг не помещается в QR-код */
  async generateQRCode(config: string): Promise<Buffer | null> {
    try {
      const qrBuffer = await QRCode.toBuffer(config, {
        errorCorrectionLevel: 'M',
        type: 'png',
        width: QR_WIDTH,
        margin: 2
      });

      logger.debug('QR code generated', { bytes: qrBuffer.length });
      return qrBuffer;
    } catch (error) {
      logger.error('Error generating QR code', { error: describeError(error), configLength: config.length });
      return null;
    }
  }
}
