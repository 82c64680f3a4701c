import { Injectable, Logger } from '@nestjs/common';
import { FuturesOrdersService } from '../../modules/futures-orders/services/futures-orders.service';
import { OrderRequestValidator } from '../../modules/futures-orders/services/order-request.validator';
import { CliOutput } from '../presentation/cli-output';
import { ConfirmPrompt } from '../presentation/confirm.prompt';
import { TerminalRenderer } from '../presentation/terminal.renderer';
import { EXIT_SUCCESS, reportFailure } from './command-failure';

export interface CancelOrderOptions {
  symbol?: string;
  orderId?: string;
  yes?: boolean;
}

@Injectable()
export class CancelOrderCommand {
  private readonly logger = new Logger(CancelOrderCommand.name);

  constructor(
    private readonly validator: OrderRequestValidator,
    private readonly futuresOrders: FuturesOrdersService,
    private readonly renderer: TerminalRenderer,
    private readonly prompt: ConfirmPrompt,
    private readonly output: CliOutput,
  ) {}

  async run(options: CancelOrderOptions): Promise<number> {
    try {
      const request = this.validator.validateCancelOrder({
        symbol: options.symbol,
        orderId: options.orderId,
      });

      if (!options.yes && !(await this.prompt.confirm(`Cancel order ${request.orderId} on ${request.symbol}?`))) {
        this.output.print(this.renderer.notice('Cancellation aborted by user.'));
        return EXIT_SUCCESS;
      }

      const cancelled = await this.futuresOrders.cancelOrder(request);
      this.output.print(this.renderer.orderCancelled(cancelled));
      return EXIT_SUCCESS;
    } catch (error) {
      return reportFailure(error, this.renderer, this.output, this.logger);
    }
  }
}
