import { InvoiceItem } from './invoice-item';

export interface InvoiceDraft {
  invoiceNumber?: string;
  customerName?: string;
  customerEmail?: string;
  customerGst?: string;
  invoiceDate?: string; // YYYY-MM-DD
  dueDate?: string; // YYYY-MM-DD
  currency: string;
  taxPercent: number;
  shippingFee: number;
  discount: number;
  discountCode?: string;
  items: InvoiceItem[];
}
