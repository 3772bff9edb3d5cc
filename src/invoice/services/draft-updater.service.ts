import { Inject, Injectable, Logger } from '@nestjs/common';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { InvoiceItem } from '../interfaces/invoice-item';
import {
  InvoicePatch,
  invoicePatchSchema,
  ScalarField,
  ScalarFields,
} from '../types/invoice.types';
import { addDays, CLOCK, Clock, toIsoDate } from '../utils/dates';
import { mergeItems } from '../utils/item-merger';
import { FieldExtractorService } from './field-extractor.service';

const DUE_AFTER_DAYS = 7;

interface ValidatedPatch {
  fields: ScalarFields;
  items: InvoiceItem[];
}

@Injectable()
export class DraftUpdaterService {
  private readonly logger = new Logger(DraftUpdaterService.name);

  constructor(
    private readonly fieldExtractor: FieldExtractorService,
    @Inject(CLOCK) private readonly clock: Clock,
  ) {}

  /**
   * Returns the draft with the utterance (and the optional AI patch) applied.
   *
   * Present values overwrite, absent ones never erase. When both sources set
   * the same field the patch wins. Items from both sources are merged by name.
   * The input draft is left untouched.
   */
  update(
    draft: InvoiceDraft,
    utterance: string,
    externalPatch?: unknown,
  ): InvoiceDraft {
    const local = this.fieldExtractor.extract(utterance);
    const patch =
      externalPatch === undefined || externalPatch === null
        ? undefined
        : this.validatePatch(externalPatch);

    const fields: ScalarFields = {};
    overlayFields(fields, local.fields);
    if (patch) {
      overlayFields(fields, patch.fields);
    }
    const incomingItems = [...local.items, ...(patch?.items ?? [])];

    const updated: InvoiceDraft = {
      ...draft,
      ...fields,
      items: mergeItems(draft.items, incomingItems),
    };
    return this.applyDateDefaults(updated);
  }

  private validatePatch(externalPatch: unknown): ValidatedPatch | undefined {
    const result = invoicePatchSchema.safeParse(externalPatch);
    if (!result.success) {
      // Recovered silently for the user: this turn keeps local extraction only
      this.logger.warn(
        `Discarding malformed extraction patch: ${result.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'} ${issue.message}`)
          .join(', ')}`,
      );
      return undefined;
    }
    return toValidatedPatch(result.data);
  }

  private applyDateDefaults(draft: InvoiceDraft): InvoiceDraft {
    if (draft.invoiceDate && draft.dueDate) {
      return draft;
    }
    const today = this.clock.now();
    return {
      ...draft,
      invoiceDate: draft.invoiceDate ?? toIsoDate(today),
      dueDate: draft.dueDate ?? toIsoDate(addDays(today, DUE_AFTER_DAYS)),
    };
  }
}

const SCALAR_FIELDS: readonly ScalarField[] = [
  'invoiceNumber',
  'customerName',
  'customerEmail',
  'customerGst',
  'invoiceDate',
  'dueDate',
  'currency',
  'taxPercent',
  'shippingFee',
  'discount',
  'discountCode',
];

function copyField<K extends ScalarField>(
  target: ScalarFields,
  source: ScalarFields,
  field: K,
): void {
  const value = source[field];
  if (value !== undefined) {
    target[field] = value;
  }
}

// Later calls win; undefined never overwrites
function overlayFields(target: ScalarFields, source: ScalarFields): void {
  for (const field of SCALAR_FIELDS) {
    copyField(target, source, field);
  }
}

function toValidatedPatch(patch: InvoicePatch): ValidatedPatch {
  const { items, ...fields } = patch;
  return { fields, items };
}
