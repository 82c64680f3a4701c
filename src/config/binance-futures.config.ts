import { registerAs } from '@nestjs/config';

export const BINANCE_FUTURES_TESTNET_URL = 'https://testnet.binancefuture.com';

export interface BinanceFuturesConfig {
  baseUrl: string;
  apiKey: string;
  apiSecret: string;
  recvWindow: number;
  timeout: number;
}

export default registerAs(
  'binanceFutures',
  (): BinanceFuturesConfig => ({
    baseUrl: process.env.BINANCE_FUTURES_BASE_URL || BINANCE_FUTURES_TESTNET_URL,

    // Testnet account credentials, from the environment or .env
    apiKey: process.env.BINANCE_API_KEY || '',
    apiSecret: process.env.BINANCE_API_SECRET || '',

    recvWindow: Number(process.env.BINANCE_RECV_WINDOW || 5000), // ms
    timeout: Number(process.env.BINANCE_HTTP_TIMEOUT_MS || 10000), // ms
  }),
);
