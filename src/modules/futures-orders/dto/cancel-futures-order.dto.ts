import { Transform } from 'class-transformer';
import { IsInt, IsNotEmpty, IsPositive, IsString, Matches } from 'class-validator';
import { SYMBOL_PATTERN } from './place-futures-order.dto';
import { toOptionalNumber, toUpperTrimmed } from './transforms';

export class CancelFuturesOrderDto {
  @Transform(toUpperTrimmed)
  @Matches(SYMBOL_PATTERN, { message: 'symbol must contain only letters and digits, e.g. BTCUSDT' })
  @IsString()
  @IsNotEmpty({ message: 'symbol is required' })
  symbol!: string;

  @Transform(toOptionalNumber)
  @IsPositive({ message: 'orderId must be greater than zero' })
  @IsInt({ message: 'orderId must be an integer' })
  orderId!: number;
}
