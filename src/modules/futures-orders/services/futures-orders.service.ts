import { Injectable, Logger } from '@nestjs/common';
import { CancelFuturesOrderDto } from '../dto/cancel-futures-order.dto';
import { FuturesOrderDto } from '../dto/futures-order.dto';
import { ListOpenOrdersDto } from '../dto/list-open-orders.dto';
import { PlaceFuturesOrderDto } from '../dto/place-futures-order.dto';
import { BinanceFuturesApiService } from '../integrations/binance-futures.service';

export type SymbolListing = 'listed' | 'unlisted' | 'unknown';

@Injectable()
export class FuturesOrdersService {
  private readonly logger = new Logger(FuturesOrdersService.name);

  constructor(private readonly binanceFuturesApi: BinanceFuturesApiService) {}

  /**
   * Best-effort lookup against exchange info. A failed lookup is
   * reported as 'unknown' and never stops the caller.
   */
  async checkSymbolListed(symbol: string): Promise<SymbolListing> {
    try {
      const symbols = await this.binanceFuturesApi.getTradingSymbols();
      return symbols.has(symbol) ? 'listed' : 'unlisted';
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Could not verify symbol ${symbol} against exchange info: ${reason}`);
      return 'unknown';
    }
  }

  async placeOrder(order: PlaceFuturesOrderDto): Promise<FuturesOrderDto> {
    this.logger.log(
      `Placing order | symbol=${order.symbol} side=${order.side} type=${order.type} quantity=${order.quantity} price=${order.price ?? 'N/A'}`,
    );

    const placed = await this.binanceFuturesApi.placeOrder({
      symbol: order.symbol,
      side: order.side,
      type: order.type,
      quantity: order.quantity,
      ...(order.type === 'LIMIT' ? { price: order.price, timeInForce: order.timeInForce } : {}),
    });

    this.logger.log(
      `Order placed successfully | orderId=${placed.orderId} status=${placed.status} executedQty=${placed.executedQuantity}`,
    );
    return placed;
  }

  async cancelOrder(request: CancelFuturesOrderDto): Promise<FuturesOrderDto> {
    const cancelled = await this.binanceFuturesApi.cancelOrder(request.symbol, request.orderId);
    this.logger.log(`Order cancelled | orderId=${cancelled.orderId} status=${cancelled.status}`);
    return cancelled;
  }

  async listOpenOrders(query: ListOpenOrdersDto): Promise<FuturesOrderDto[]> {
    const orders = await this.binanceFuturesApi.getOpenOrders(query.symbol);

    // The exchange filters by symbol already; keep the result exact regardless
    const filtered = query.symbol ? orders.filter((order) => order.symbol === query.symbol) : orders;

    this.logger.log(`Fetched ${filtered.length} open order(s)${query.symbol ? ` for ${query.symbol}` : ''}`);
    return filtered;
  }
}
