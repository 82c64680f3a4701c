import { Module } from '@nestjs/common';
import { BinanceFuturesApiService } from './integrations/binance-futures.service';
import { FuturesOrdersService } from './services/futures-orders.service';
import { OrderRequestValidator } from './services/order-request.validator';

@Module({
  providers: [BinanceFuturesApiService, FuturesOrdersService, OrderRequestValidator],
  exports: [FuturesOrdersService, OrderRequestValidator],
})
export class FuturesOrdersModule {}
