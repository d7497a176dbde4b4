import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import {
  Between,
  FindOperator,
  FindOptionsWhere,
  LessThanOrEqual,
  MoreThanOrEqual,
  Repository,
} from 'typeorm';
import { ConflictError, DomainValidationError, NotFoundError } from '../common/errors';
import { isCalendarDate } from '../common/validators/calendar-date';
import { CreateOrderDto } from './dto/create-order.dto';
import { ListOrdersQueryDto } from './dto/list-orders-query.dto';
import { Order } from './entities/order.entity';
import { OrderLog } from './entities/order-log.entity';
import { OrderState, isOrderState } from './order-state';

@Injectable()
export class OrdersService {
  private readonly logger = new Logger(OrdersService.name);

  constructor(
    @InjectRepository(Order)
    private readonly orderRepository: Repository<Order>,
    @InjectRepository(OrderLog)
    private readonly logRepository: Repository<OrderLog>,
  ) {}

  /**
   * Persists a new order in `pending`.
   * Validates again here so callers other than the HTTP layer get the same rules.
   */
  async create(dto: CreateOrderDto): Promise<Order> {
    this.assertValid(dto);

    const order = await this.orderRepository.save(
      this.orderRepository.create({
        userId: dto.user_id,
        itemId: dto.item_id,
        startDate: dto.start_date,
        endDate: dto.end_date,
        state: 'pending',
      }),
    );
    await this.recordTransition(order.id, null, 'pending');

    this.logger.log(
      `📝 Order ${order.id} created | User: ${order.userId} | Item: ${order.itemId} | ${order.startDate} → ${order.endDate}`,
    );

    return order;
  }

  async get(id: number): Promise<Order> {
    const order = await this.orderRepository.findOneBy({ id });
    if (!order) {
      throw new NotFoundError(`Order ${id} not found`, 'ORDER_NOT_FOUND');
    }
    return order;
  }

  async list(filters: ListOrdersQueryDto = {}): Promise<Order[]> {
    const where: FindOptionsWhere<Order> = {};

    if (filters.userId !== undefined) where.userId = filters.userId;
    if (filters.itemId !== undefined) where.itemId = filters.itemId;
    if (filters.state !== undefined) {
      if (!isOrderState(filters.state)) return [];
      where.state = filters.state;
    }

    const createdAt = this.createdAtRange(filters.from, filters.to);
    if (createdAt) where.createdAt = createdAt;

    return this.orderRepository.find({ where, order: { id: 'ASC' } });
  }

  /**
   * Compare-and-swap on the order state.
   * A single conditional UPDATE, so two callers racing from the same state
   * cannot both win.
   */
  async transition(id: number, from: OrderState, to: OrderState): Promise<Order> {
    const result = await this.orderRepository.update({ id, state: from }, { state: to });

    if (!result.affected) {
      const current = await this.get(id);
      this.logger.warn(`⚠️ Order ${id} transition ${from} → ${to} refused, order is ${current.state}`);
      throw new ConflictError(
        `Order ${id} is ${current.state}, expected ${from}`,
        'INVALID_ORDER_STATE',
      );
    }

    await this.recordTransition(id, from, to);
    this.logger.log(`🔄 Order ${id}: ${from} → ${to}`);

    return this.get(id);
  }

  /**
   * Only pending orders can be cancelled.
   */
  async cancel(id: number): Promise<Order> {
    return this.transition(id, 'pending', 'cancelled');
  }

  async logs(id: number): Promise<OrderLog[]> {
    await this.get(id);
    return this.logRepository.find({
      where: { orderId: id },
      order: { timestamp: 'ASC', id: 'ASC' },
    });
  }

  private async recordTransition(
    orderId: number,
    fromState: OrderState | null,
    toState: OrderState,
  ): Promise<void> {
    await this.logRepository.save(this.logRepository.create({ orderId, fromState, toState }));
  }

  private createdAtRange(from?: Date, to?: Date): FindOperator<Date> | undefined {
    if (from && to) return Between(from, to);
    if (from) return MoreThanOrEqual(from);
    if (to) return LessThanOrEqual(to);
    return undefined;
  }

  private assertValid(dto: CreateOrderDto): void {
    for (const field of ['user_id', 'item_id'] as const) {
      const value = dto[field];
      if (!Number.isInteger(value) || value <= 0) {
        throw new DomainValidationError(`${field} must be a positive integer`);
      }
    }

    for (const field of ['start_date', 'end_date'] as const) {
      if (!isCalendarDate(dto[field])) {
        throw new DomainValidationError(`${field} must be a valid date in YYYY-MM-DD format`);
      }
    }

    if (dto.end_date < dto.start_date) {
      throw new DomainValidationError('end_date must not be before start_date', 'INVALID_DATE_RANGE');
    }
  }
}
