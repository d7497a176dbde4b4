export const ORDER_STATES = ['pending', 'confirming', 'confirmed', 'failed', 'cancelled'] as const;

/** confirmed, failed and cancelled are terminal */
export type OrderState = (typeof ORDER_STATES)[number];

export function isOrderState(value: string): value is OrderState {
  return ORDER_STATES.some((state) => state === value);
}
