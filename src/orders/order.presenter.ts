import { Order } from './entities/order.entity';
import { OrderLog } from './entities/order-log.entity';
import { OrderState } from './order-state';

export interface OrderLinks {
  self: string;
  user: string;
  item: string;
}

/** Wire shape of an order */
export interface OrderResponse {
  id: number;
  user_id: number;
  item_id: number;
  start_date: string;
  end_date: string;
  state: OrderState;
  created_at: string;
  updated_at: string;
  links: OrderLinks;
}

export interface OrderLogResponse {
  log_id: number;
  order_id: number;
  from_state: OrderState | null;
  to_state: OrderState;
  timestamp: string;
}

export function orderLocation(id: number): string {
  return `/orders/${id}`;
}

export function toOrderResponse(order: Order): OrderResponse {
  return {
    id: order.id,
    user_id: order.userId,
    item_id: order.itemId,
    start_date: order.startDate,
    end_date: order.endDate,
    state: order.state,
    created_at: order.createdAt.toISOString(),
    updated_at: order.updatedAt.toISOString(),
    links: {
      self: orderLocation(order.id),
      user: `/users/${order.userId}`,
      item: `/items/${order.itemId}`,
    },
  };
}

export function toOrderLogResponse(log: OrderLog): OrderLogResponse {
  return {
    log_id: log.id,
    order_id: log.orderId,
    from_state: log.fromState,
    to_state: log.toState,
    timestamp: log.timestamp.toISOString(),
  };
}
