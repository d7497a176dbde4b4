import { Type } from 'class-transformer';
import { IsDate, IsInt, IsOptional, IsPositive, IsString } from 'class-validator';

/**
 * Query string of GET /orders. Every filter is optional; given filters are ANDed.
 */
export class ListOrdersQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  userId?: number;

  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @IsPositive()
  itemId?: number;

  /** A value that is not an order state matches nothing */
  @IsOptional()
  @IsString()
  state?: string;

  /** Lower bound on created_at */
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  from?: Date;

  /** Upper bound on created_at */
  @IsOptional()
  @Type(() => Date)
  @IsDate()
  to?: Date;
}
