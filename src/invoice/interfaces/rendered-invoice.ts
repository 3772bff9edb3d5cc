export interface InvoiceTotals {
  subtotal: number;
  taxAmount: number;
  shippingFee: number;
  discount: number;
  grandTotal: number;
}

export interface RenderedInvoice extends InvoiceTotals {
  text: string;
}
