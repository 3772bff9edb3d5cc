import { InvoiceTotals } from './rendered-invoice';

export interface InvoiceRecordItem {
  name: string;
  quantity: number;
  unitPrice: number;
  lineTotal: number;
}

export interface InvoiceRecord extends InvoiceTotals {
  id: string;
  invoiceNumber: string | null;
  customerName: string | null;
  customerEmail: string | null;
  customerGst: string | null;
  invoiceDate: string | null;
  dueDate: string | null;
  currency: string;
  taxPercent: number;
  discountCode: string | null;
  items: InvoiceRecordItem[];
  createdAt: string;
}
