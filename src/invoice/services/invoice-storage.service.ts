import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { InvoiceDraft } from '../interfaces/invoice-draft';
import { InvoiceRecord } from '../interfaces/invoice-record';
import { InvoiceTotals } from '../interfaces/rendered-invoice';
import { describeError } from '../utils/errors';
import { lineTotal } from '../utils/money';

interface StoredEntries {
  entries: unknown[];
  intact: boolean;
}

/**
 * Finalized invoices, appended to a single JSON array on disk.
 *
 * Writes go through one promise chain so two finalizations never interleave a
 * read-modify-write. A missing or unreadable file reads as an empty list; an
 * unreadable one is kept as a .bak file when the next save replaces it.
 */
@Injectable()
export class InvoiceStorageService {
  private readonly logger = new Logger(InvoiceStorageService.name);
  private readonly storagePath: string;
  private writeQueue: Promise<unknown> = Promise.resolve();

  constructor(private readonly configService: ConfigService) {
    this.storagePath = path.resolve(
      process.cwd(),
      this.configService.get<string>(
        'INVOICE_STORAGE_PATH',
        'data/invoices.json',
      ),
    );
  }

  async save(draft: InvoiceDraft, totals: InvoiceTotals): Promise<InvoiceRecord> {
    const record = toRecord(draft, totals);
    const write = this.writeQueue.then(async () => {
      const stored = await this.readEntries();
      if (!stored.intact) {
        await this.setAside();
      }
      await this.persist([...stored.entries, record]);
    });
    // keep the chain alive after a failed write
    this.writeQueue = write.catch(() => undefined);
    await write;

    this.logger.log(
      `Saved invoice ${record.id} (${record.invoiceNumber ?? 'no number'}) for ${record.customerName}`,
    );
    return record;
  }

  async list(): Promise<InvoiceRecord[]> {
    const { entries } = await this.readEntries();
    return entries.filter(isInvoiceRecord);
  }

  // Looks up by record id first, then by invoice number
  async get(idOrNumber: string): Promise<InvoiceRecord | undefined> {
    const invoices = await this.list();
    return (
      invoices.find((invoice) => invoice.id === idOrNumber) ??
      invoices.find((invoice) => invoice.invoiceNumber === idOrNumber)
    );
  }

  /**
   * Every entry of the file, recognised or not, so that a save writes back
   * what it found. intact is false when the file exists but holds no list.
   */
  private async readEntries(): Promise<StoredEntries> {
    let raw: string;
    try {
      raw = await readFile(this.storagePath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return { entries: [], intact: true };
      }
      throw error;
    }

    try {
      const parsed: unknown = JSON.parse(raw);
      if (!Array.isArray(parsed)) {
        this.logger.warn(`${this.storagePath} does not hold a list, ignoring it`);
        return { entries: [], intact: false };
      }
      return { entries: parsed, intact: true };
    } catch (error) {
      this.logger.warn(
        `Could not parse ${this.storagePath}: ${describeError(error).message}`,
      );
      return { entries: [], intact: false };
    }
  }

  // Moves an unusable file out of the way before it is replaced
  private async setAside(): Promise<void> {
    const backup = `${this.storagePath}.${Date.now()}.bak`;
    await rename(this.storagePath, backup);
    this.logger.warn(`Moved unreadable ${this.storagePath} to ${backup}`);
  }

  private async persist(entries: unknown[]): Promise<void> {
    await mkdir(path.dirname(this.storagePath), { recursive: true });
    const temporary = `${this.storagePath}.tmp`;
    await writeFile(temporary, JSON.stringify(entries, null, 2), 'utf-8');
    await rename(temporary, this.storagePath);
  }
}

function toRecord(draft: InvoiceDraft, totals: InvoiceTotals): InvoiceRecord {
  const shortId = uuidv4().replace(/-/g, '').slice(0, 6).toUpperCase();
  return {
    id: `INV-${shortId}`,
    invoiceNumber: draft.invoiceNumber ?? null,
    customerName: draft.customerName ?? null,
    customerEmail: draft.customerEmail ?? null,
    customerGst: draft.customerGst ?? null,
    invoiceDate: draft.invoiceDate ?? null,
    dueDate: draft.dueDate ?? null,
    currency: draft.currency,
    taxPercent: draft.taxPercent,
    discountCode: draft.discountCode ?? null,
    items: draft.items.map((item) => ({
      name: item.name,
      quantity: item.quantity,
      unitPrice: item.unitPrice,
      lineTotal: lineTotal(item.quantity, item.unitPrice),
    })),
    subtotal: totals.subtotal,
    taxAmount: totals.taxAmount,
    shippingFee: totals.shippingFee,
    discount: totals.discount,
    grandTotal: totals.grandTotal,
    createdAt: new Date().toISOString(),
  };
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    error.code === 'ENOENT'
  );
}

function isInvoiceRecord(value: unknown): value is InvoiceRecord {
  return (
    typeof value === 'object' &&
    value !== null &&
    'id' in value &&
    typeof value.id === 'string' &&
    'items' in value &&
    Array.isArray(value.items)
  );
}
