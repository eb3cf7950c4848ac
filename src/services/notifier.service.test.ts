import { Api } from 'grammy';
import { TelegramNotifier } from './notifier.service';

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn()
  }
}));

describe('TelegramNotifier', () => {
  test('sends HTML messages', async () => {
    const api = new Api('test-token');
    const sendMessage = jest.spyOn(api, 'sendMessage').mockResolvedValue(
      {} as Awaited<ReturnType<Api['sendMessage']>>
    );

    await new TelegramNotifier(api).notify(501, '<b>hi</b>');

    expect(sendMessage).toHaveBeenCalledWith(501, '<b>hi</b>', { parse_mode: 'HTML' });
  });

  test('propagates delivery errors', async () => {
    const api = new Api('test-token');
    jest.spyOn(api, 'sendMessage').mockRejectedValue(new Error('Forbidden: bot was blocked by the user'));

    await expect(new TelegramNotifier(api).notify(501, 'x')).rejects.toThrow('Forbidden: bot was blocked by the user');
  });
});
