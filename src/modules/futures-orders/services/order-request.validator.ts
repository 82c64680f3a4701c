import { Injectable, Logger } from '@nestjs/common';
import { ClassConstructor, plainToInstance } from 'class-transformer';
import { ValidationError, validateSync } from 'class-validator';
import { CancelFuturesOrderDto } from '../dto/cancel-futures-order.dto';
import { ListOpenOrdersDto } from '../dto/list-open-orders.dto';
import { PlaceFuturesOrderDto } from '../dto/place-futures-order.dto';
import { FieldValidationError, OrderValidationException } from '../exceptions/futures.exceptions';

export interface RawPlaceOrderInput {
  symbol?: string;
  side?: string;
  type?: string;
  quantity?: string | number;
  price?: string | number;
  timeInForce?: string;
}

export interface RawCancelOrderInput {
  symbol?: string;
  orderId?: string | number;
}

export interface RawListOrdersInput {
  symbol?: string;
}

/**
 * Turns raw command-line input into validated request DTOs.
 * Runs before any network call; a failure never reaches the exchange.
 */
@Injectable()
export class OrderRequestValidator {
  private readonly logger = new Logger(OrderRequestValidator.name);

  validatePlaceOrder(raw: RawPlaceOrderInput): PlaceFuturesOrderDto {
    return this.validate(PlaceFuturesOrderDto, raw);
  }

  validateCancelOrder(raw: RawCancelOrderInput): CancelFuturesOrderDto {
    return this.validate(CancelFuturesOrderDto, raw);
  }

  validateListOrders(raw: RawListOrdersInput): ListOpenOrdersDto {
    return this.validate(ListOpenOrdersDto, raw);
  }

  private validate<T extends object>(dtoClass: ClassConstructor<T>, raw: object): T {
    const dto = plainToInstance(dtoClass, withoutUndefined(raw));
    const errors = validateSync(dto, { forbidUnknownValues: true, stopAtFirstError: true });

    if (errors.length > 0) {
      const fieldErrors = errors.map(toFieldError);
      this.logger.warn(
        `Rejected ${dtoClass.name}: ${fieldErrors.map((e) => `${e.field} (${e.constraints.join('; ')})`).join(', ')}`,
      );
      throw new OrderValidationException(fieldErrors);
    }

    this.logger.debug(`Validated ${dtoClass.name}: ${JSON.stringify(dto)}`);
    return dto;
  }
}

function toFieldError(error: ValidationError): FieldValidationError {
  return {
    field: error.property,
    constraints: Object.values(error.constraints ?? {}),
  };
}

function withoutUndefined(raw: object): Record<string, unknown> {
  return Object.fromEntries(Object.entries(raw).filter(([, value]) => value !== undefined));
}
