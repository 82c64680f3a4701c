export const ORDER_SIDES = ['BUY', 'SELL'] as const;
export const ORDER_TYPES = ['MARKET', 'LIMIT'] as const;
export const TIME_IN_FORCE = ['GTC', 'IOC', 'FOK'] as const;

export type OrderSide = (typeof ORDER_SIDES)[number];
export type OrderType = (typeof ORDER_TYPES)[number];
export type TimeInForce = (typeof TIME_IN_FORCE)[number];

export const DEFAULT_TIME_IN_FORCE: TimeInForce = 'GTC';

// Finest step the futures testnet takes for quantity and price
export const MAX_DECIMAL_PLACES = 8;

export const hasAtMostDecimalPlaces = (value: number, places = MAX_DECIMAL_PLACES): boolean =>
  Number(value.toFixed(places)) === value;
