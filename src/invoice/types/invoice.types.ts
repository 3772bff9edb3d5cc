import { z } from 'zod';
import { InvoiceItem } from '../interfaces/invoice-item';
import { parseIsoDate } from '../utils/dates';

// Conversation phases of a single session
export type ConversationPhase = 'EMPTY' | 'DRAFTING' | 'BLOCKED' | 'COMPLETE';

// Fields a validation profile may require
export type RequiredField =
  | 'invoiceNumber'
  | 'customerName'
  | 'customerEmail'
  | 'items';

export type ProfileName = 'relaxed' | 'strict';

export interface InvoiceProfile {
  name: ProfileName;
  requiredFields: readonly RequiredField[];
  defaultTaxPercent: number;
}

// Scalar draft fields that extraction and patches can set
export interface ScalarFields {
  invoiceNumber?: string;
  customerName?: string;
  customerEmail?: string;
  customerGst?: string;
  invoiceDate?: string;
  dueDate?: string;
  currency?: string;
  taxPercent?: number;
  shippingFee?: number;
  discount?: number;
  discountCode?: string;
}

export type ScalarField = keyof ScalarFields;

export interface ExtractionResult {
  fields: ScalarFields;
  items: InvoiceItem[];
}

// Patch Schema
// Shape expected from the AI extraction fallback. Null or "" means "not mentioned".
const blankToUndefined = (value: string | null | undefined) =>
  value ? value : undefined;

const optionalText = z.string().trim().nullish().transform(blankToUndefined);
const optionalAmount = z
  .number()
  .finite()
  .nonnegative()
  .nullish()
  .transform((value) => value ?? undefined);
const optionalDate = z
  .string()
  .refine((value) => value === '' || parseIsoDate(value) !== undefined, {
    message: 'Expected a YYYY-MM-DD calendar date',
  })
  .nullish()
  .transform(blankToUndefined);

export const invoicePatchSchema = z.object({
  invoiceNumber: optionalText,
  customerName: optionalText,
  customerEmail: z
    .union([z.literal(''), z.string().trim().email()])
    .nullish()
    .transform(blankToUndefined),
  customerGst: optionalText,
  invoiceDate: optionalDate,
  dueDate: optionalDate,
  currency: z
    .union([z.literal(''), z.string().regex(/^[A-Za-z]{3}$/)])
    .nullish()
    .transform((code) => (code ? code.toUpperCase() : undefined)),
  taxPercent: optionalAmount,
  shippingFee: optionalAmount,
  discount: optionalAmount,
  discountCode: optionalText,
  items: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        quantity: z.number().finite().positive(),
        unitPrice: z.number().finite().nonnegative(),
      }),
    )
    .nullish()
    .transform((items) => items ?? []),
});

export type InvoicePatch = z.infer<typeof invoicePatchSchema>;
