import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import axios, { AxiosError, AxiosInstance, Method } from 'axios';
import { createHmac } from 'crypto';
import { BinanceFuturesConfig } from '../../../config/binance-futures.config';
import { FuturesOrderDto } from '../dto/futures-order.dto';
import { OrderSide, OrderType, TimeInForce } from '../dto/futures-order.types';
import {
  FuturesApiException,
  FuturesConnectionException,
  FuturesRateLimitException,
  InvalidFuturesApiKeyException,
  MissingCredentialsException,
} from '../exceptions/futures.exceptions';

export interface BinanceFuturesOrder {
  orderId: number;
  clientOrderId: string;
  symbol: string;
  side: string;
  type: string;
  status: string;
  timeInForce: string;
  price: string;
  avgPrice: string;
  origQty: string;
  executedQty: string;
  cumQuote: string;
  updateTime: number;
}

interface BinanceFuturesExchangeInfo {
  symbols: Array<{
    symbol: string;
    status: string;
  }>;
}

interface BinanceErrorBody {
  code: number;
  msg: string;
}

export interface NewFuturesOrderParams {
  symbol: string;
  side: OrderSide;
  type: OrderType;
  quantity: number;
  price?: number;
  timeInForce?: TimeInForce;
}

type QueryParams = Record<string, string | number | undefined>;

// Exchange codes for a rejected key, secret or signature
const AUTH_ERROR_CODES = new Set([-1022, -2014, -2015]);

@Injectable()
export class BinanceFuturesApiService {
  private readonly logger = new Logger(BinanceFuturesApiService.name);
  private readonly config: BinanceFuturesConfig;
  private readonly apiClient: AxiosInstance;

  constructor(configService: ConfigService) {
    this.config = configService.getOrThrow<BinanceFuturesConfig>('binanceFutures');
    this.apiClient = axios.create({
      baseURL: this.config.baseUrl,
      timeout: this.config.timeout,
    });
  }

  /**
   * Creates a signature for Binance Futures API requests
   */
  private createSignature(queryString: string, secret: string): string {
    return createHmac('sha256', secret).update(queryString).digest('hex');
  }

  /**
   * Makes a single signed request. Binance takes the signed parameters
   * in the query string for every method, including POST and DELETE.
   */
  private async makeSignedRequest<T>(
    method: Method,
    endpoint: string,
    params: QueryParams = {},
  ): Promise<T> {
    const { apiKey, apiSecret, recvWindow } = this.config;
    if (!apiKey || !apiSecret) {
      throw new MissingCredentialsException();
    }

    const queryString = toQueryString({ ...params, recvWindow, timestamp: Date.now() });
    const signature = this.createSignature(queryString, apiSecret);

    this.logger.debug(`${method} ${endpoint} | Query: ${queryString}`);

    try {
      const response = await this.apiClient.request<T>({
        method,
        url: `${endpoint}?${queryString}&signature=${signature}`,
        headers: {
          'X-MBX-APIKEY': apiKey,
        },
      });
      this.logger.debug(`Response received for ${method} ${endpoint}`);
      return response.data;
    } catch (error) {
      throw this.toFuturesException(error, `${method} ${endpoint}`);
    }
  }

  /**
   * Makes a public request (no signature required)
   */
  private async makePublicRequest<T>(endpoint: string, params: QueryParams = {}): Promise<T> {
    try {
      const response = await this.apiClient.get<T>(endpoint, { params });
      return response.data;
    } catch (error) {
      throw this.toFuturesException(error, `GET ${endpoint}`);
    }
  }

  private toFuturesException(error: unknown, request: string): Error {
    if (!axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const axiosError: AxiosError = error;
    const response = axiosError.response;

    if (!response) {
      this.logger.error(`${request} failed without a response: ${axiosError.message}`);
      return new FuturesConnectionException(
        `Could not reach Binance Futures Testnet (${axiosError.code ?? axiosError.message}). ` +
          'Please check your internet connection and try again.',
      );
    }

    this.logger.error(`${request} failed | Status: ${response.status}, Data: ${JSON.stringify(response.data)}`);

    const body = isBinanceErrorBody(response.data) ? response.data : undefined;
    const message = body?.msg ?? axiosError.message;

    if (response.status === 418 || response.status === 429) {
      return new FuturesRateLimitException(message, body?.code);
    }
    if (response.status === 401 || (body && AUTH_ERROR_CODES.has(body.code))) {
      return new InvalidFuturesApiKeyException(message, body?.code);
    }
    return new FuturesApiException(message, body?.code, response.status);
  }

  /**
   * Gets the symbols that are currently trading on the futures testnet
   */
  async getTradingSymbols(): Promise<Set<string>> {
    this.logger.debug('Fetching futures exchange info for symbol validation');
    const exchangeInfo = await this.makePublicRequest<BinanceFuturesExchangeInfo>('/fapi/v1/exchangeInfo');

    const symbols = new Set(
      (exchangeInfo.symbols ?? []).filter((s) => s.status === 'TRADING').map((s) => s.symbol),
    );
    this.logger.debug(`Fetched ${symbols.size} active futures symbols from exchange info`);
    return symbols;
  }

  /**
   * Places a new order on the futures testnet
   */
  async placeOrder(order: NewFuturesOrderParams): Promise<FuturesOrderDto> {
    const params: QueryParams = {
      symbol: order.symbol,
      side: order.side,
      type: order.type,
      quantity: formatDecimal(order.quantity),
    };

    if (order.type === 'LIMIT') {
      if (order.price === undefined) {
        throw new FuturesApiException('Price is required for LIMIT orders');
      }
      params.price = formatDecimal(order.price);
      params.timeInForce = order.timeInForce ?? 'GTC';
    }

    this.logger.log(`Placing ${order.type} order: ${JSON.stringify(params)}`);

    const placed = await this.makeSignedRequest<BinanceFuturesOrder>('POST', '/fapi/v1/order', params);
    return toFuturesOrderDto(placed);
  }

  /**
   * Cancels an open order
   */
  async cancelOrder(symbol: string, orderId: number): Promise<FuturesOrderDto> {
    this.logger.log(`Cancelling order ${orderId} on ${symbol}`);
    const cancelled = await this.makeSignedRequest<BinanceFuturesOrder>('DELETE', '/fapi/v1/order', {
      symbol,
      orderId,
    });
    return toFuturesOrderDto(cancelled);
  }

  /**
   * Gets open orders for a specific symbol or all symbols
   */
  async getOpenOrders(symbol?: string): Promise<FuturesOrderDto[]> {
    const params = symbol ? { symbol } : {};
    const orders = await this.makeSignedRequest<BinanceFuturesOrder[]>('GET', '/fapi/v1/openOrders', params);
    return orders.map(toFuturesOrderDto);
  }
}

export function toFuturesOrderDto(order: BinanceFuturesOrder): FuturesOrderDto {
  return {
    orderId: order.orderId,
    clientOrderId: order.clientOrderId,
    symbol: order.symbol,
    side: order.side,
    type: order.type,
    status: order.status,
    timeInForce: order.timeInForce,
    price: parseFloat(order.price),
    avgPrice: parseFloat(order.avgPrice),
    quantity: parseFloat(order.origQty),
    executedQuantity: parseFloat(order.executedQty),
    cumulativeQuote: parseFloat(order.cumQuote),
    updateTime: order.updateTime,
  };
}

/**
 * Plain decimal notation; the exchange rejects exponents such as 1e-7.
 */
export function formatDecimal(value: number): string {
  const text = String(value);
  if (!/e/i.test(text)) {
    return text;
  }
  return value.toFixed(20).replace(/\.?0+$/, '');
}

function toQueryString(params: QueryParams): string {
  const query: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) {
      query[key] = String(value);
    }
  }
  return new URLSearchParams(query).toString();
}

function isBinanceErrorBody(data: unknown): data is BinanceErrorBody {
  return (
    typeof data === 'object' &&
    data !== null &&
    'code' in data &&
    typeof data.code === 'number' &&
    'msg' in data &&
    typeof data.msg === 'string'
  );
}
