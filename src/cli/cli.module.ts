import { Module } from '@nestjs/common';
import { FuturesOrdersModule } from '../modules/futures-orders/futures-orders.module';
import { CancelOrderCommand } from './commands/cancel-order.command';
import { ListOrdersCommand } from './commands/list-orders.command';
import { PlaceOrderCommand } from './commands/place-order.command';
import { CliOutput } from './presentation/cli-output';
import { ConfirmPrompt } from './presentation/confirm.prompt';
import { TerminalRenderer } from './presentation/terminal.renderer';

@Module({
  imports: [FuturesOrdersModule],
  providers: [
    PlaceOrderCommand,
    CancelOrderCommand,
    ListOrdersCommand,
    TerminalRenderer,
    ConfirmPrompt,
    CliOutput,
  ],
  exports: [PlaceOrderCommand, CancelOrderCommand, ListOrdersCommand],
})
export class CliModule {}
