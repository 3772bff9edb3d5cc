import { Inject, Injectable } from '@nestjs/common';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { ValidationResult } from '../interfaces/validation-result';
import { INVOICE_PROFILE } from '../config/invoice-profile';
import { InvoiceProfile, RequiredField } from '../types/invoice.types';

const SUGGESTIONS = {
  customerName: "What is the customer's name?",
  customerEmail: 'Could you provide their email address?',
  customerGst: 'Do you have a GST number to include? (Optional but recommended)',
  discountCode: 'Do you have any discount codes or offers to apply?',
} as const;

@Injectable()
export class ValidationService {
  constructor(
    @Inject(INVOICE_PROFILE) private readonly profile: InvoiceProfile,
  ) {}

  get profileName(): string {
    return this.profile.name;
  }

  validate(draft: InvoiceDraft): ValidationResult {
    const missing = this.profile.requiredFields.filter((field) =>
      isMissing(draft, field),
    );
    return {
      missing,
      suggestions: this.suggestions(draft),
      complete: missing.length === 0,
    };
  }

  // Prompts for every absent field, required or not, in a fixed order
  suggestions(draft: InvoiceDraft): string[] {
    const tips: string[] = [];
    if (!draft.customerName) tips.push(SUGGESTIONS.customerName);
    if (!draft.customerEmail) tips.push(SUGGESTIONS.customerEmail);
    if (!draft.customerGst) tips.push(SUGGESTIONS.customerGst);
    if (!draft.discountCode) tips.push(SUGGESTIONS.discountCode);
    return tips;
  }
}

function isMissing(draft: InvoiceDraft, field: RequiredField): boolean {
  switch (field) {
    case 'items':
      return draft.items.length === 0;
    case 'invoiceNumber':
      return !draft.invoiceNumber;
    case 'customerName':
      return !draft.customerName;
    case 'customerEmail':
      return !draft.customerEmail;
  }
}
