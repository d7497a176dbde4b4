import { IsInt, IsPositive } from 'class-validator';
import { IsCalendarDate } from '../../common/validators/is-calendar-date.validator';
import { IsOnOrAfter } from '../../common/validators/is-on-or-after.validator';

export class CreateOrderDto {
  @IsInt({ message: 'user_id must be an integer' })
  @IsPositive({ message: 'user_id must be positive' })
  user_id!: number;

  @IsInt({ message: 'item_id must be an integer' })
  @IsPositive({ message: 'item_id must be positive' })
  item_id!: number;

  @IsCalendarDate()
  start_date!: string;

  @IsCalendarDate()
  @IsOnOrAfter('start_date')
  end_date!: string;
}
