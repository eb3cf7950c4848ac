import { Bot } from 'grammy';
import { loadConfig } from './utils/config';
import { describeError } from './utils/errors';
import logger from './utils/logger';
import { QRCodeGenerator } from './utils/qrcode';
import { DatabaseService } from './services/database.service';
import { TelegramNotifier } from './services/notifier.service';
import { ProvisioningService } from './services/provisioning.service';
import { PurchaseService } from './services/purchase.service';
import { SshConnector } from './services/remote-host.service';
import { SubscriptionChecker } from './services/subscription-checker.service';
import { AdminHandler } from './handlers/admin.handler';
import { PaymentHandler, StarsRefunder } from './handlers/payment.handler';
import { StartHandler } from './handlers/start.handler';

async function main() {
  try {
    // Загружаем конфигурацию
    const config = loadConfig();

    // Создаем бота
    const bot = new Bot(config.telegramBotToken);
    logger.info('Bot instance created');

    // Инициализируем сервисы
    const db = new DatabaseService(config.dbPath);
    for (const adminId of config.adminIds) {
      db.ensureAdmin(adminId);
    }

    const provisioning = new ProvisioningService(new SshConnector(), {
      configDir: config.vpnConfigDir,
      connectTimeoutMs: config.sshConnectTimeoutMs,
      setupTimeoutMs: config.serverSetupTimeoutMs,
      wireguard: config.wireguard
    });

    const purchaseService = new PurchaseService(db, provisioning, new StarsRefunder(bot.api));
    const checker = new SubscriptionChecker({
      repository: db,
      provisioning,
      notifier: new TelegramNotifier(bot.api),
      intervalMs: config.checkIntervalMinutes * 60 * 1000,
      warningDays: config.expiryWarningDays
    });

    // Инициализируем обработчики
    const startHandler = new StartHandler(db);
    const paymentHandler = new PaymentHandler(db, purchaseService, new QRCodeGenerator());
    const adminHandler = new AdminHandler(db, provisioning, config.adminIds, config.adminActionTimeoutMs);

    // Middleware для логирования
    bot.use(async (ctx, next) => {
      const userId = ctx.from?.id;
      const username = ctx.from?.username;
      const command = ctx.message?.text;

      logger.info('Received update', { userId, username, command });

      try {
        await next();
      } catch (error) {
        logger.error('Error processing update', {
          error: describeError(error),
          userId,
          command
        });
      }
    });

    // Обработчики команд - базовые
    bot.command('start', (ctx) => startHandler.handleStart(ctx));
    bot.command('help', (ctx) => startHandler.handleHelp(ctx));
    bot.command('mysubs', (ctx) => startHandler.handleMySubscriptions(ctx));

    // Оплата
    bot.command('buy', (ctx) => paymentHandler.handleBuy(ctx));
    bot.on('pre_checkout_query', (ctx) => paymentHandler.handlePreCheckout(ctx));
    bot.on('message:successful_payment', (ctx) => paymentHandler.handleSuccessfulPayment(ctx));

    // Обработчики команд - администрирование
    bot.command('admin', (ctx) => adminHandler.handleAdminHelp(ctx));
    bot.command('servers', (ctx) => adminHandler.handleServers(ctx));
    bot.command('addserver', (ctx) => adminHandler.handleAddServer(ctx));
    bot.command('cancel', (ctx) => adminHandler.handleCancel(ctx));
    bot.command('setupserver', (ctx) => adminHandler.handleSetupServer(ctx));
    bot.command('sub', (ctx) => adminHandler.handleSubscription(ctx));
    bot.command('block', (ctx) => adminHandler.handleBlock(ctx));
    bot.command('unblock', (ctx) => adminHandler.handleUnblock(ctx));
    bot.command('revoke', (ctx) => adminHandler.handleRevoke(ctx));

    // Шаги диалога добавления сервера
    bot.on('message:text', async (ctx, next) => {
      if (await adminHandler.handleDialogText(ctx)) return;
      await next();
    });

    // Обработчик неизвестных команд
    bot.on('message:text', async (ctx) => {
      if (ctx.message.text.startsWith('/')) {
        await ctx.reply('❓ Неизвестная команда. Используйте /help для списка доступных команд.');
      }
    });

    // Обработка ошибок
    bot.catch((err) => {
      const ctx = err.ctx;
      logger.error('Error in bot', {
        error: describeError(err.error),
        userId: ctx.from?.id,
        update: ctx.update
      });
    });

    // Обработка сигналов завершения
    const shutdown = async (signal: string) => {
      logger.info(`Received ${signal}, stopping bot...`);
      await checker.stop();
      await bot.stop();
      db.close();
    };

    process.once('SIGINT', () => {
      shutdown('SIGINT').catch((error: unknown) => {
        logger.error('Error during shutdown', { error: describeError(error) });
        process.exit(1);
      });
    });

    process.once('SIGTERM', () => {
      shutdown('SIGTERM').catch((error: unknown) => {
        logger.error('Error during shutdown', { error: describeError(error) });
        process.exit(1);
      });
    });

    checker.start();

    // Запускаем бота
    logger.info('Starting bot...');
    await bot.start({
      onStart: (botInfo) => {
        logger.info('Bot started successfully', {
          username: botInfo.username,
          id: botInfo.id
        });
        console.log(`
╔═══════════════════════════════════════╗
║   🤖 WireGuard VPN Shop Bot Started   ║
╚═══════════════════════════════════════╝

Bot: @${botInfo.username}
ID: ${botInfo.id}
Admins: ${config.adminIds.join(', ')}

Bot is ready to accept commands!
        `);
      }
    });
  } catch (error) {
    logger.error('Fatal error during bot initialization', {
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined
    });
    process.exit(1);
  }
}

// Запускаем бота
void main();
