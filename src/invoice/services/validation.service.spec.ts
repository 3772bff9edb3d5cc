import { Test, TestingModule } from '@nestjs/testing';
import { INVOICE_PROFILE, resolveProfile } from '../config/invoice-profile';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { ProfileName } from '../types/invoice.types';
import { createEmptyDraft } from './draft-store.service';
import { ValidationService } from './validation.service';

async function createService(profile: ProfileName): Promise<ValidationService> {
  const module: TestingModule = await Test.createTestingModule({
    providers: [
      ValidationService,
      { provide: INVOICE_PROFILE, useValue: resolveProfile(profile) },
    ],
  }).compile();
  return module.get<ValidationService>(ValidationService);
}

describe('ValidationService', () => {
  const complete: InvoiceDraft = {
    ...createEmptyDraft(18),
    customerName: 'Asha Rao',
    customerEmail: 'asha@example.com',
    items: [{ name: 'Tea', quantity: 1, unitPrice: 200 }],
  };

  it('reports name, email and items for an empty draft (relaxed)', async () => {
    const service = await createService('relaxed');

    const result = service.validate(createEmptyDraft(18));

    expect(result.missing).toEqual(['customerName', 'customerEmail', 'items']);
    expect(result.complete).toBe(false);
    expect(result.suggestions).toEqual([
      "What is the customer's name?",
      'Could you provide their email address?',
      'Do you have a GST number to include? (Optional but recommended)',
      'Do you have any discount codes or offers to apply?',
    ]);
  });

  it('also requires the invoice number under the strict profile', async () => {
    const service = await createService('strict');

    expect(service.validate(createEmptyDraft(0)).missing).toEqual([
      'invoiceNumber',
      'customerName',
      'customerEmail',
      'items',
    ]);
    expect(service.validate(complete).missing).toEqual(['invoiceNumber']);
  });

  it('passes a draft with name, email and one item (relaxed)', async () => {
    const service = await createService('relaxed');

    const result = service.validate(complete);

    expect(result.missing).toEqual([]);
    expect(result.complete).toBe(true);
    // optional prompts stay until the fields are given
    expect(result.suggestions).toEqual([
      'Do you have a GST number to include? (Optional but recommended)',
      'Do you have any discount codes or offers to apply?',
    ]);
  });

  it('does not check item contents', async () => {
    const service = await createService('relaxed');

    const result = service.validate({
      ...complete,
      items: [{ name: 'Tea', quantity: 0, unitPrice: 200 }],
    });

    expect(result.complete).toBe(true);
  });

  it('has no suggestions once every prompted field is present', async () => {
    const service = await createService('relaxed');

    expect(
      service.suggestions({
        ...complete,
        customerGst: '29ABCDE1234F1Z5',
        discountCode: 'SAVE10',
      }),
    ).toEqual([]);
  });
});
