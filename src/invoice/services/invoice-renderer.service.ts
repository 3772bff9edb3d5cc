import { Injectable } from '@nestjs/common';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import {
  InvoiceTotals,
  RenderedInvoice,
} from '../interfaces/rendered-invoice';
import {
  currencyLabel,
  formatMoney,
  formatQuantity,
  lineTotal,
  roundMoney,
} from '../utils/money';

const NOT_PROVIDED = 'Not Provided';

@Injectable()
export class InvoiceRendererService {
  /**
   * Computes totals in a fixed order, rounding at every step:
   * each line, then subtotal, tax, and the grand total.
   */
  computeTotals(draft: InvoiceDraft): InvoiceTotals {
    const subtotal = roundMoney(
      draft.items.reduce(
        (sum, item) => sum + lineTotal(item.quantity, item.unitPrice),
        0,
      ),
    );
    const taxAmount = roundMoney((subtotal * draft.taxPercent) / 100);
    const grandTotal = roundMoney(
      subtotal + taxAmount + draft.shippingFee - draft.discount,
    );
    return {
      subtotal,
      taxAmount,
      shippingFee: draft.shippingFee,
      discount: draft.discount,
      grandTotal,
    };
  }

  render(draft: InvoiceDraft): RenderedInvoice {
    const totals = this.computeTotals(draft);
    const symbol = currencyLabel(draft.currency);
    const amount = (value: number) => `${symbol}${formatMoney(value)}`;

    const lines = [
      `Invoice ${draft.invoiceNumber ?? 'DRAFT'}`,
      `Customer: ${draft.customerName ?? NOT_PROVIDED}`,
      `Email: ${draft.customerEmail ?? NOT_PROVIDED}`,
      `GSTIN: ${draft.customerGst ?? NOT_PROVIDED}`,
      `Date: ${draft.invoiceDate ?? NOT_PROVIDED}`,
      `Due Date: ${draft.dueDate ?? NOT_PROVIDED}`,
      '',
      'Line Items',
      ...draft.items.map(
        (item) =>
          `• ${item.name} — ${formatQuantity(item.quantity)} × ${formatMoney(item.unitPrice)} = ${formatMoney(
            lineTotal(item.quantity, item.unitPrice),
          )}`,
      ),
      '',
      `Subtotal: ${amount(totals.subtotal)}`,
      `Tax (${formatQuantity(draft.taxPercent)}%): ${amount(totals.taxAmount)}`,
      `Shipping: ${amount(totals.shippingFee)}`,
      `Discount: -${amount(totals.discount)}`,
      `Discount Code: ${draft.discountCode ?? NOT_PROVIDED}`,
      `Grand Total: ${amount(totals.grandTotal)}`,
    ];

    return { ...totals, text: lines.join('\n') };
  }
}
