import { CreateOrderDto } from '../../src/orders/dto/create-order.dto';

export function orderInput(overrides: Partial<CreateOrderDto> = {}): CreateOrderDto {
  return Object.assign(new CreateOrderDto(), {
    user_id: 2,
    item_id: 99,
    start_date: '2025-01-01',
    end_date: '2025-01-05',
    ...overrides,
  });
}
