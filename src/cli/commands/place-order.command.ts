import { Injectable, Logger } from '@nestjs/common';
import { OrderValidationException } from '../../modules/futures-orders/exceptions/futures.exceptions';
import { FuturesOrdersService } from '../../modules/futures-orders/services/futures-orders.service';
import { OrderRequestValidator } from '../../modules/futures-orders/services/order-request.validator';
import { CliOutput } from '../presentation/cli-output';
import { ConfirmPrompt } from '../presentation/confirm.prompt';
import { TerminalRenderer } from '../presentation/terminal.renderer';
import { EXIT_SUCCESS, reportFailure } from './command-failure';

export interface PlaceOrderOptions {
  symbol?: string;
  side?: string;
  type?: string;
  quantity?: string;
  price?: string;
  timeInForce?: string;
  dryRun?: boolean;
  skipSymbolCheck?: boolean;
  yes?: boolean;
}

@Injectable()
export class PlaceOrderCommand {
  private readonly logger = new Logger(PlaceOrderCommand.name);

  constructor(
    private readonly validator: OrderRequestValidator,
    private readonly futuresOrders: FuturesOrdersService,
    private readonly renderer: TerminalRenderer,
    private readonly prompt: ConfirmPrompt,
    private readonly output: CliOutput,
  ) {}

  async run(options: PlaceOrderOptions): Promise<number> {
    try {
      // 1. Validate before anything touches the network
      const order = this.validator.validatePlaceOrder({
        symbol: options.symbol,
        side: options.side,
        type: options.type,
        quantity: options.quantity,
        price: options.price,
        timeInForce: options.timeInForce,
      });

      // 2. Pre-flight symbol lookup; only a definite "not listed" stops the order
      if (!options.skipSymbolCheck) {
        const listing = await this.futuresOrders.checkSymbolListed(order.symbol);
        if (listing === 'unlisted') {
          throw new OrderValidationException([
            {
              field: 'symbol',
              constraints: [`${order.symbol} is not an actively trading symbol on the futures testnet`],
            },
          ]);
        }
        if (listing === 'unknown') {
          this.output.printError(
            this.renderer.warning(`could not verify ${order.symbol} against exchange info, continuing`),
          );
        }
      }

      // 3. Summary and confirmation
      this.output.print(this.renderer.orderSummary(order));

      if (options.dryRun) {
        this.logger.log(`Dry run for ${order.symbol}, order not submitted`);
        this.output.print(this.renderer.dryRunNotice());
        return EXIT_SUCCESS;
      }

      if (!options.yes && !(await this.prompt.confirm('Confirm order placement?'))) {
        this.output.print(this.renderer.notice('Order cancelled by user.'));
        return EXIT_SUCCESS;
      }

      // 4. Submit once and show the result
      const placed = await this.futuresOrders.placeOrder(order);
      this.output.print(this.renderer.orderPlaced(placed));
      return EXIT_SUCCESS;
    } catch (error) {
      return reportFailure(error, this.renderer, this.output, this.logger);
    }
  }
}
