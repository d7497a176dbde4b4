import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Query,
  Res,
} from '@nestjs/common';
import type { Response } from 'express';
import { CreateOrderDto } from './dto/create-order.dto';
import { ListOrdersQueryDto } from './dto/list-orders-query.dto';
import {
  OrderLogResponse,
  OrderResponse,
  orderLocation,
  toOrderLogResponse,
  toOrderResponse,
} from './order.presenter';
import { OrdersService } from './orders.service';

@Controller('orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async createOrder(
    @Body() dto: CreateOrderDto,
    @Res({ passthrough: true }) res: Response,
  ): Promise<OrderResponse> {
    const order = await this.ordersService.create(dto);
    res.setHeader('Location', orderLocation(order.id));
    return toOrderResponse(order);
  }

  @Get()
  async listOrders(@Query() query: ListOrdersQueryDto): Promise<OrderResponse[]> {
    const orders = await this.ordersService.list(query);
    return orders.map(toOrderResponse);
  }

  @Get(':id')
  async getOrder(@Param('id', ParseIntPipe) id: number): Promise<OrderResponse> {
    return toOrderResponse(await this.ordersService.get(id));
  }

  @Delete(':id')
  async cancelOrder(
    @Param('id', ParseIntPipe) id: number,
  ): Promise<{ message: string; order: OrderResponse }> {
    const order = await this.ordersService.cancel(id);
    return { message: 'Order cancelled successfully', order: toOrderResponse(order) };
  }

  @Get(':id/logs')
  async getOrderLogs(@Param('id', ParseIntPipe) id: number): Promise<OrderLogResponse[]> {
    const logs = await this.ordersService.logs(id);
    return logs.map(toOrderLogResponse);
  }
}
