export interface InvoiceItem {
  readonly name: string;
  readonly quantity: number;
  readonly unitPrice: number;
}
