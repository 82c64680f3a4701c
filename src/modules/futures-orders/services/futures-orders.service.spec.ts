import { Test, TestingModule } from '@nestjs/testing';
import { buildFuturesOrder } from '../../../testing/futures-order.fixtures';
import { FuturesApiException, FuturesConnectionException } from '../exceptions/futures.exceptions';
import { BinanceFuturesApiService } from '../integrations/binance-futures.service';
import { FuturesOrdersService } from './futures-orders.service';
import { OrderRequestValidator } from './order-request.validator';

describe('FuturesOrdersService', () => {
  let service: FuturesOrdersService;
  let validator: OrderRequestValidator;
  const binanceFuturesApi = {
    getTradingSymbols: jest.fn(),
    placeOrder: jest.fn(),
    cancelOrder: jest.fn(),
    getOpenOrders: jest.fn(),
  };

  beforeEach(async () => {
    jest.resetAllMocks();

    const moduleFixture: TestingModule = await Test.createTestingModule({
      providers: [
        FuturesOrdersService,
        OrderRequestValidator,
        { provide: BinanceFuturesApiService, useValue: binanceFuturesApi },
      ],
    }).compile();

    service = moduleFixture.get<FuturesOrdersService>(FuturesOrdersService);
    validator = moduleFixture.get<OrderRequestValidator>(OrderRequestValidator);
  });

  describe('checkSymbolListed', () => {
    it('should report a trading symbol as listed', async () => {
      binanceFuturesApi.getTradingSymbols.mockResolvedValue(new Set(['BTCUSDT', 'ETHUSDT']));

      await expect(service.checkSymbolListed('BTCUSDT')).resolves.toBe('listed');
    });

    it('should report a missing symbol as unlisted', async () => {
      binanceFuturesApi.getTradingSymbols.mockResolvedValue(new Set(['BTCUSDT']));

      await expect(service.checkSymbolListed('DOGEBTC')).resolves.toBe('unlisted');
    });

    it('should degrade to unknown when exchange info cannot be fetched', async () => {
      binanceFuturesApi.getTradingSymbols.mockRejectedValue(new FuturesConnectionException());

      await expect(service.checkSymbolListed('BTCUSDT')).resolves.toBe('unknown');
    });
  });

  describe('placeOrder', () => {
    it('should submit a MARKET order once without price or time in force', async () => {
      const placed = buildFuturesOrder();
      binanceFuturesApi.placeOrder.mockResolvedValue(placed);
      const order = validator.validatePlaceOrder({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: '0.01' });

      await expect(service.placeOrder(order)).resolves.toBe(placed);

      expect(binanceFuturesApi.placeOrder).toHaveBeenCalledTimes(1);
      expect(binanceFuturesApi.placeOrder).toHaveBeenCalledWith({
        symbol: 'BTCUSDT',
        side: 'BUY',
        type: 'MARKET',
        quantity: 0.01,
      });
    });

    it('should submit a LIMIT order with its price and time in force', async () => {
      binanceFuturesApi.placeOrder.mockResolvedValue(buildFuturesOrder({ type: 'LIMIT', price: 60000 }));
      const order = validator.validatePlaceOrder({
        symbol: 'BTCUSDT',
        side: 'BUY',
        type: 'LIMIT',
        quantity: '0.01',
        price: '60000',
        timeInForce: 'IOC',
      });

      await service.placeOrder(order);

      expect(binanceFuturesApi.placeOrder).toHaveBeenCalledWith({
        symbol: 'BTCUSDT',
        side: 'BUY',
        type: 'LIMIT',
        quantity: 0.01,
        price: 60000,
        timeInForce: 'IOC',
      });
    });

    it('should pass exchange errors through untouched', async () => {
      const rejection = new FuturesApiException('Margin is insufficient.', -2019);
      binanceFuturesApi.placeOrder.mockRejectedValue(rejection);
      const order = validator.validatePlaceOrder({ symbol: 'BTCUSDT', side: 'BUY', type: 'MARKET', quantity: '5' });

      await expect(service.placeOrder(order)).rejects.toBe(rejection);
      expect(binanceFuturesApi.placeOrder).toHaveBeenCalledTimes(1);
    });
  });

  describe('cancelOrder', () => {
    it('should cancel by symbol and order id', async () => {
      binanceFuturesApi.cancelOrder.mockResolvedValue(buildFuturesOrder({ status: 'CANCELED' }));

      const cancelled = await service.cancelOrder({ symbol: 'BTCUSDT', orderId: 4092371823 });

      expect(binanceFuturesApi.cancelOrder).toHaveBeenCalledWith('BTCUSDT', 4092371823);
      expect(cancelled.status).toBe('CANCELED');
    });
  });

  describe('listOpenOrders', () => {
    const openOrders = [
      buildFuturesOrder({ orderId: 1, symbol: 'BTCUSDT' }),
      buildFuturesOrder({ orderId: 2, symbol: 'ETHUSDT' }),
      buildFuturesOrder({ orderId: 3, symbol: 'BTCUSDT' }),
    ];

    it('should return every open order without a filter', async () => {
      binanceFuturesApi.getOpenOrders.mockResolvedValue(openOrders);

      const orders = await service.listOpenOrders({});

      expect(binanceFuturesApi.getOpenOrders).toHaveBeenCalledWith(undefined);
      expect(orders.map((o) => o.orderId)).toEqual([1, 2, 3]);
    });

    it('should return only orders for the requested symbol', async () => {
      binanceFuturesApi.getOpenOrders.mockResolvedValue(openOrders);

      const orders = await service.listOpenOrders({ symbol: 'BTCUSDT' });

      expect(binanceFuturesApi.getOpenOrders).toHaveBeenCalledWith('BTCUSDT');
      expect(orders.map((o) => o.orderId)).toEqual([1, 3]);
    });
  });
});
