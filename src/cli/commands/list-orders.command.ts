import { Injectable, Logger } from '@nestjs/common';
import { FuturesOrdersService } from '../../modules/futures-orders/services/futures-orders.service';
import { OrderRequestValidator } from '../../modules/futures-orders/services/order-request.validator';
import { CliOutput } from '../presentation/cli-output';
import { TerminalRenderer } from '../presentation/terminal.renderer';
import { EXIT_SUCCESS, reportFailure } from './command-failure';

export interface ListOrdersOptions {
  symbol?: string;
}

@Injectable()
export class ListOrdersCommand {
  private readonly logger = new Logger(ListOrdersCommand.name);

  constructor(
    private readonly validator: OrderRequestValidator,
    private readonly futuresOrders: FuturesOrdersService,
    private readonly renderer: TerminalRenderer,
    private readonly output: CliOutput,
  ) {}

  async run(options: ListOrdersOptions): Promise<number> {
    try {
      const query = this.validator.validateListOrders({ symbol: options.symbol });
      const orders = await this.futuresOrders.listOpenOrders(query);
      this.output.print(this.renderer.openOrders(orders, query.symbol));
      return EXIT_SUCCESS;
    } catch (error) {
      return reportFailure(error, this.renderer, this.output, this.logger);
    }
  }
}
