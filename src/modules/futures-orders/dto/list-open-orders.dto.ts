import { Transform } from 'class-transformer';
import { IsOptional, IsString, Matches } from 'class-validator';
import { SYMBOL_PATTERN } from './place-futures-order.dto';
import { toUpperTrimmed } from './transforms';

export class ListOpenOrdersDto {
  @Transform(toUpperTrimmed)
  @Matches(SYMBOL_PATTERN, { message: 'symbol must contain only letters and digits, e.g. BTCUSDT' })
  @IsString()
  @IsOptional()
  symbol?: string;
}
