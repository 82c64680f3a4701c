import { Transform } from 'class-transformer';
import {
  IsIn,
  IsNotEmpty,
  IsNumber,
  IsPositive,
  IsString,
  Matches,
  Validate,
  ValidationArguments,
  ValidatorConstraint,
  ValidatorConstraintInterface,
} from 'class-validator';
import {
  DEFAULT_TIME_IN_FORCE,
  hasAtMostDecimalPlaces,
  MAX_DECIMAL_PLACES,
  ORDER_SIDES,
  ORDER_TYPES,
  OrderSide,
  OrderType,
  TIME_IN_FORCE,
  TimeInForce,
} from './futures-order.types';
import { toOptionalNumber, toTimeInForce, toUpperTrimmed } from './transforms';

export const SYMBOL_PATTERN = /^[A-Z0-9]+$/;

const isLimitOrder = (order: object): boolean => 'type' in order && order.type === 'LIMIT';

/**
 * price is present if and only if the order is a LIMIT order,
 * and when present it is a positive finite number.
 */
@ValidatorConstraint({ name: 'priceMatchesOrderType', async: false })
export class PriceMatchesOrderTypeConstraint implements ValidatorConstraintInterface {
  validate(value: unknown, args: ValidationArguments): boolean {
    const isLimit = isLimitOrder(args.object);
    if (value === undefined) {
      return !isLimit;
    }
    if (!isLimit) {
      return false;
    }
    return isPositiveNumber(value) && hasAtMostDecimalPlaces(value);
  }

  defaultMessage(args: ValidationArguments): string {
    const isLimit = isLimitOrder(args.object);
    if (args.value === undefined) {
      return 'price is required when type is LIMIT, provide --price <value>';
    }
    if (!isLimit) {
      return 'price must only be set when type is LIMIT';
    }
    if (isPositiveNumber(args.value)) {
      return `price must have at most ${MAX_DECIMAL_PLACES} decimal places`;
    }
    return 'price must be a positive number';
  }
}

@ValidatorConstraint({ name: 'maxDecimalPlaces', async: false })
export class MaxDecimalPlacesConstraint implements ValidatorConstraintInterface {
  validate(value: unknown): boolean {
    return typeof value === 'number' && hasAtMostDecimalPlaces(value);
  }

  defaultMessage(args: ValidationArguments): string {
    return `${args.property} must have at most ${MAX_DECIMAL_PLACES} decimal places`;
  }
}

function isPositiveNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

// class-validator runs a property's decorators bottom-up; with
// stopAtFirstError the lowest failing check is the one reported.
export class PlaceFuturesOrderDto {
  @Transform(toUpperTrimmed)
  @Matches(SYMBOL_PATTERN, { message: 'symbol must contain only letters and digits, e.g. BTCUSDT' })
  @IsString()
  @IsNotEmpty({ message: 'symbol is required' })
  symbol!: string;

  @Transform(toUpperTrimmed)
  @IsIn(ORDER_SIDES, { message: 'side must be one of: BUY, SELL' })
  side!: OrderSide;

  @Transform(toUpperTrimmed)
  @IsIn(ORDER_TYPES, { message: 'type must be one of: MARKET, LIMIT' })
  type!: OrderType;

  @Transform(toOptionalNumber)
  @Validate(MaxDecimalPlacesConstraint)
  @IsPositive({ message: 'quantity must be greater than zero' })
  @IsNumber({ allowNaN: false, allowInfinity: false }, { message: 'quantity must be a number' })
  quantity!: number;

  @Transform(toOptionalNumber)
  @Validate(PriceMatchesOrderTypeConstraint)
  price?: number;

  @Transform(toTimeInForce)
  @IsIn(TIME_IN_FORCE, { message: 'timeInForce must be one of: GTC, IOC, FOK' })
  timeInForce: TimeInForce = DEFAULT_TIME_IN_FORCE;
}
