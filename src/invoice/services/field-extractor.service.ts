import { Injectable } from '@nestjs/common';
import { InvoiceItem } from '../interfaces/invoice-item';
import {
  ExtractionResult,
  ScalarField,
  ScalarFields,
} from '../types/invoice.types';
import { parseIsoDate } from '../utils/dates';

interface FieldRule {
  field: ScalarField;
  pattern: RegExp;
  // Writes the parsed value into target; false when the capture does not parse
  apply(raw: string, target: ScalarFields): boolean;
}

const NUMBER = /^\d+(?:\.\d+)?$/;

function parseNumber(raw: string): number | undefined {
  return NUMBER.test(raw) ? Number(raw) : undefined;
}

function parseText(raw: string): string | undefined {
  const text = raw.trim();
  return text.length > 0 ? text : undefined;
}

function parseCode(raw: string): string | undefined {
  return parseText(raw)?.toUpperCase();
}

function rule<K extends ScalarField>(
  field: K,
  pattern: RegExp,
  parse: (raw: string) => ScalarFields[K],
): FieldRule {
  return {
    field,
    pattern,
    apply(raw, target) {
      const value = parse(raw);
      if (value === undefined) {
        return false;
      }
      target[field] = value;
      return true;
    },
  };
}

/**
 * ----------------------------------------------------------------
 * Field rules - one entry per scalar field, first match wins
 * ----------------------------------------------------------------
 * New fields are added here; extract() never changes.
 */
const FIELD_RULES: readonly FieldRule[] = [
  rule(
    'invoiceNumber',
    /\binvoice\s*(?:(?:number|no)\b\.?\s*[:#]?|#|:)\s*(?!(?:invoice|number|no)\b)([\w\-/]+)/i,
    parseText,
  ),
  rule(
    'customerName',
    /\b(?:customer|client|buyer)(?:\s*name)?\s*:\s*([^,;\n]+)/i,
    parseText,
  ),
  rule(
    'customerEmail',
    /\b(?:e-?mail|mail)\s*:\s*([\w.+-]+@[\w-]+(?:\.[\w-]+)+)/i,
    parseText,
  ),
  rule(
    'customerGst',
    /\b(?:gstin|gst\s*(?:no\.?|number|id)|tax\s*id)\s*[:#]?\s*([a-z0-9]+)/i,
    parseCode,
  ),
  rule(
    'invoiceDate',
    /(?<!due\s*)\b(?:invoice\s*date|date)\s*:\s*(\d{4}-\d{2}-\d{2})\b/i,
    parseIsoDate,
  ),
  rule(
    'dueDate',
    /\bdue(?:\s*date)?\s*:\s*(\d{4}-\d{2}-\d{2})\b/i,
    parseIsoDate,
  ),
  rule('currency', /\bcurrency\s*:\s*([a-z]{3})\b/i, parseCode),
  rule(
    'taxPercent',
    /\b(?:tax|gst|vat)(?:\s*(?:percent|rate))?\s*[:=]?\s*(\d+(?:\.\d+)*)\s*%?/i,
    parseNumber,
  ),
  rule(
    'shippingFee',
    /\b(?:shipping|delivery)(?:\s*(?:fee|charge|cost))?\s*[:=]?\s*(\d+(?:\.\d+)*)/i,
    parseNumber,
  ),
  rule('discount', /\bdiscount\s*[:=]?\s*(\d+(?:\.\d+)*)/i, parseNumber),
  rule(
    'discountCode',
    /\b(?:discount\s*code|coupon(?:\s*code)?|promo(?:\s*code)?)\s*[:=]?\s*([a-z0-9-]+)/i,
    parseCode,
  ),
];

// <qty> x <name> @ <price>; the name never crosses an '@'
const ITEM_PATTERN = /(?<![\w.-])(\d+(?:\.\d+)*)\s*x\s+([^@\n]+?)\s*@\s*(\d+(?:\.\d+)*)/gi;

@Injectable()
export class FieldExtractorService {
  extract(utterance: string): ExtractionResult {
    const fields: ScalarFields = {};
    for (const fieldRule of FIELD_RULES) {
      const match = fieldRule.pattern.exec(utterance);
      if (match) {
        fieldRule.apply(match[1], fields);
      }
    }
    return { fields, items: this.extractItems(utterance) };
  }

  extractItems(utterance: string): InvoiceItem[] {
    const items: InvoiceItem[] = [];
    for (const match of utterance.matchAll(ITEM_PATTERN)) {
      const quantity = parseNumber(match[1]);
      const name = parseText(match[2]);
      const unitPrice = parseNumber(match[3]);
      if (
        quantity === undefined ||
        quantity <= 0 ||
        name === undefined ||
        unitPrice === undefined
      ) {
        continue;
      }
      items.push({ name, quantity, unitPrice });
    }
    return items;
  }
}
