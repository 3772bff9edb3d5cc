import { Test, TestingModule } from '@nestjs/testing';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { mergeItems } from '../utils/item-merger';
import { createEmptyDraft } from './draft-store.service';
import { InvoiceRendererService } from './invoice-renderer.service';

describe('InvoiceRendererService', () => {
  let renderer: InvoiceRendererService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      providers: [InvoiceRendererService],
    }).compile();

    renderer = module.get<InvoiceRendererService>(InvoiceRendererService);
  });

  it('computes totals for the laptop order', () => {
    const draft: InvoiceDraft = {
      ...createEmptyDraft(18),
      shippingFee: 500,
      items: [{ name: 'Laptop', quantity: 2, unitPrice: 50000 }],
    };

    expect(renderer.computeTotals(draft)).toEqual({
      subtotal: 100000,
      taxAmount: 18000,
      shippingFee: 500,
      discount: 0,
      grandTotal: 118500,
    });
  });

  it('rounds each line before summing', () => {
    const draft: InvoiceDraft = {
      ...createEmptyDraft(0),
      items: [
        { name: 'A', quantity: 1, unitPrice: 0.333 },
        { name: 'B', quantity: 1, unitPrice: 0.333 },
        { name: 'C', quantity: 1, unitPrice: 0.333 },
      ],
    };

    // unrounded the sum would be 0.999 -> 1.00
    expect(renderer.computeTotals(draft).subtotal).toBe(0.99);
  });

  it('renders a stable layout with placeholders', () => {
    const draft: InvoiceDraft = {
      ...createEmptyDraft(5),
      customerName: 'Asha Rao',
      customerEmail: 'asha@example.com',
      invoiceDate: '2026-03-10',
      dueDate: '2026-03-17',
      shippingFee: 40,
      discount: 10,
      items: [
        { name: 'Notebook', quantity: 2, unitPrice: 120 },
        { name: 'Tea', quantity: 1.5, unitPrice: 200 },
      ],
    };

    const rendered = renderer.render(draft);

    expect(rendered.text).toBe(
      [
        'Invoice DRAFT',
        'Customer: Asha Rao',
        'Email: asha@example.com',
        'GSTIN: Not Provided',
        'Date: 2026-03-10',
        'Due Date: 2026-03-17',
        '',
        'Line Items',
        '• Notebook — 2 × 120.00 = 240.00',
        '• Tea — 1.5 × 200.00 = 300.00',
        '',
        'Subtotal: ₹540.00',
        'Tax (5%): ₹27.00',
        'Shipping: ₹40.00',
        'Discount: -₹10.00',
        'Discount Code: Not Provided',
        'Grand Total: ₹597.00',
      ].join('\n'),
    );
    expect(rendered.grandTotal).toBe(597);
  });

  it('uses the invoice number, GST id, code and currency when present', () => {
    const rendered = renderer.render({
      ...createEmptyDraft(0),
      invoiceNumber: 'INV-7',
      customerGst: '29ABCDE1234F1Z5',
      discountCode: 'SAVE10',
      currency: 'USD',
      items: [{ name: 'Mug', quantity: 3, unitPrice: 4.5 }],
    });
    const lines = rendered.text.split('\n');

    expect(lines[0]).toBe('Invoice INV-7');
    expect(lines).toContain('GSTIN: 29ABCDE1234F1Z5');
    expect(lines).toContain('Discount Code: SAVE10');
    expect(lines).toContain('Subtotal: $13.50');
    expect(lines).toContain('Grand Total: $13.50');
  });

  it('prints merged quantities and the tax percent without float noise', () => {
    const rendered = renderer.render({
      ...createEmptyDraft(0.1 + 0.2),
      items: mergeItems(
        [{ name: 'Rice', quantity: 0.1, unitPrice: 100 }],
        [{ name: 'rice', quantity: 0.2, unitPrice: 100 }],
      ),
    });
    const lines = rendered.text.split('\n');

    expect(lines).toContain('• Rice — 0.3 × 100.00 = 30.00');
    expect(lines).toContain('Tax (0.3%): ₹0.09');
  });

  it('recomputes on every call', () => {
    const draft: InvoiceDraft = {
      ...createEmptyDraft(0),
      items: [{ name: 'Mug', quantity: 1, unitPrice: 100 }],
    };
    const before = renderer.render(draft);

    draft.items = [...draft.items, { name: 'Plate', quantity: 1, unitPrice: 50 }];

    expect(before.subtotal).toBe(100);
    expect(renderer.render(draft).subtotal).toBe(150);
  });
});
