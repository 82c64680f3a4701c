export interface FuturesOrderDto {
  orderId: number;
  clientOrderId: string;
  symbol: string;
  side: string;
  type: string;
  status: string;
  timeInForce: string;
  price: number;
  avgPrice: number;
  quantity: number;
  executedQuantity: number;
  cumulativeQuote: number;
  updateTime: number;
}
