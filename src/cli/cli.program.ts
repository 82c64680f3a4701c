import { INestApplicationContext } from '@nestjs/common';
import { Command } from 'commander';
import { CancelOrderCommand, CancelOrderOptions } from './commands/cancel-order.command';
import { ListOrdersCommand, ListOrdersOptions } from './commands/list-orders.command';
import { PlaceOrderCommand, PlaceOrderOptions } from './commands/place-order.command';

export const PROGRAM_NAME = 'futures-testnet';
export const PROGRAM_VERSION = '0.1.0';

/**
 * Wires the subcommands to their handlers in the application context.
 * Each action reports its outcome through `onExit`.
 */
export const createCliProgram = (
  app: INestApplicationContext,
  onExit: (code: number) => void,
): Command => {
  const program = new Command();

  // Throw instead of exiting so the application context can be closed;
  // subcommands inherit this when they are created below
  program.exitOverride();

  program
    .name(PROGRAM_NAME)
    .description('Place, cancel and list orders on the Binance USDT-M Futures Testnet')
    .version(PROGRAM_VERSION);

  program
    .command('place-order')
    .description('Place a MARKET or LIMIT futures order on the testnet')
    .option('-s, --symbol <symbol>', 'Trading pair symbol, e.g. BTCUSDT')
    .option('--side <side>', 'Order side: BUY or SELL')
    .option('-t, --type <type>', 'Order type: MARKET or LIMIT')
    .option('-q, --quantity <quantity>', 'Order quantity, must be greater than zero')
    .option('-p, --price <price>', 'Limit price, required for LIMIT orders and must be greater than zero')
    .option('--time-in-force <tif>', 'Time in force for LIMIT orders: GTC, IOC or FOK', 'GTC')
    .option('--dry-run', 'Validate and show the order summary without submitting it')
    .option('--skip-symbol-check', 'Do not look the symbol up in exchange info first')
    .option('-y, --yes', 'Submit without asking for confirmation')
    .action(async (options: PlaceOrderOptions) => {
      onExit(await app.get(PlaceOrderCommand).run(options));
    });

  program
    .command('cancel-order')
    .description('Cancel an open futures order by id')
    .option('-s, --symbol <symbol>', 'Trading pair symbol, e.g. BTCUSDT')
    .option('-i, --order-id <orderId>', 'Exchange order id')
    .option('-y, --yes', 'Cancel without asking for confirmation')
    .action(async (options: CancelOrderOptions) => {
      onExit(await app.get(CancelOrderCommand).run(options));
    });

  program
    .command('list-orders')
    .description('List open futures orders, optionally for one symbol')
    .option('-s, --symbol <symbol>', 'Only show orders for this symbol')
    .action(async (options: ListOrdersOptions) => {
      onExit(await app.get(ListOrdersCommand).run(options));
    });

  return program;
};
