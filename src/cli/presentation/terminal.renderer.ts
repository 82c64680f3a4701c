import { Injectable } from '@nestjs/common';
import { FuturesOrderDto } from '../../modules/futures-orders/dto/futures-order.dto';
import { PlaceFuturesOrderDto } from '../../modules/futures-orders/dto/place-futures-order.dto';
import { FieldValidationError } from '../../modules/futures-orders/exceptions/futures.exceptions';
import { colors, compose } from './colors';
import { Cell, formatDecimal, formatTimestamp, renderPanel, renderTable } from './layout';

const sideStyle = (side: string) => compose(side === 'BUY' ? colors.green : colors.red, colors.bold);

/**
 * Renders command output. Every method returns text; writing it is up to the caller.
 */
@Injectable()
export class TerminalRenderer {
  orderSummary(order: PlaceFuturesOrderDto): string {
    const lines: Cell[] = [
      { text: `Side          :  ${order.side}`, style: sideStyle(order.side) },
      `Type          :  ${order.type}`,
      `Symbol        :  ${order.symbol}`,
      `Quantity      :  ${order.quantity}`,
    ];

    if (order.type === 'LIMIT' && order.price !== undefined) {
      lines.push(`Price         :  ${order.price}`);
      lines.push(`Time in Force :  ${order.timeInForce}`);
      lines.push(`Est. Value    :  ${(order.price * order.quantity).toFixed(2)} USDT`);
    } else {
      lines.push('Price         :  Market Price');
    }

    return renderPanel('Order Summary', lines, 'info');
  }

  dryRunNotice(): string {
    return colors.yellow('Dry run: order validated, nothing was sent to the exchange.');
  }

  orderPlaced(order: FuturesOrderDto, now: Date = new Date()): string {
    return this.orderTable('Order Placed Successfully', order, now);
  }

  orderCancelled(order: FuturesOrderDto, now: Date = new Date()): string {
    return this.orderTable('Order Cancelled', order, now);
  }

  openOrders(orders: FuturesOrderDto[], symbol?: string): string {
    if (orders.length === 0) {
      return colors.yellow(symbol ? `No open orders for ${symbol}.` : 'No open orders.');
    }

    const rows: Cell[][] = orders.map((order) => [
      String(order.orderId),
      order.symbol,
      { text: order.side, style: sideStyle(order.side) },
      order.type,
      order.price > 0 ? formatDecimal(order.price, 8) : 'MARKET',
      formatDecimal(order.quantity, 8),
      formatDecimal(order.executedQuantity, 8),
      order.status,
      order.timeInForce,
    ]);

    return renderTable(
      symbol ? `Open Orders (${symbol}): ${orders.length}` : `Open Orders: ${orders.length}`,
      ['Order ID', 'Symbol', 'Side', 'Type', 'Price', 'Quantity', 'Executed', 'Status', 'TIF'],
      rows,
      'info',
    );
  }

  validationErrors(errors: FieldValidationError[]): string {
    const lines: Cell[] = errors.flatMap((error) =>
      error.constraints.map((constraint): Cell => ({
        text: `✗ ${error.field}: ${constraint}`,
        style: colors.red,
      })),
    );
    lines.push('');
    lines.push({ text: 'Tip: Use --help to see all available options and requirements', style: colors.dim });
    return renderPanel('Validation Error', lines, 'error');
  }

  error(title: string, message: string): string {
    return renderPanel(title, message.split('\n'), 'error');
  }

  warning(message: string): string {
    return colors.yellow(`Warning: ${message}`);
  }

  notice(message: string): string {
    return colors.yellow(message);
  }

  private orderTable(title: string, order: FuturesOrderDto, now: Date): string {
    const rows: Cell[][] = [
      ['Timestamp', { text: formatTimestamp(now), style: colors.dim }],
      ['Order ID', String(order.orderId)],
      ['Status', { text: order.status, style: compose(colors.green, colors.bold) }],
      ['Symbol', order.symbol],
      ['Side', { text: order.side, style: sideStyle(order.side) }],
      ['Type', order.type],
    ];

    if (order.price > 0) {
      rows.push(['Price', `${formatDecimal(order.price, 8)} USDT`]);
      rows.push(['Time in Force', order.timeInForce]);
    }

    rows.push(['Quantity', formatDecimal(order.quantity, 8)]);
    rows.push(['Executed Qty', formatDecimal(order.executedQuantity, 8)]);
    rows.push(['Avg Price', order.avgPrice > 0 ? `${formatDecimal(order.avgPrice, 4)} USDT` : 'N/A']);

    if (order.executedQuantity > 0 && order.avgPrice > 0) {
      const totalValue = (order.executedQuantity * order.avgPrice).toFixed(2);
      rows.push(['Total Value', { text: `${totalValue} USDT`, style: colors.bold }]);
    }

    return renderTable(title, ['Field', 'Value'], rows, 'success');
  }
}
