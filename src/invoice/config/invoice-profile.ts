import { ConfigService } from '@nestjs/config';
import { InvoiceProfile, ProfileName } from '../types/invoice.types';

export const INVOICE_PROFILE = Symbol('INVOICE_PROFILE');

const PROFILES: Record<ProfileName, InvoiceProfile> = {
  relaxed: {
    name: 'relaxed',
    requiredFields: ['customerName', 'customerEmail', 'items'],
    defaultTaxPercent: 18,
  },
  strict: {
    name: 'strict',
    requiredFields: ['invoiceNumber', 'customerName', 'customerEmail', 'items'],
    defaultTaxPercent: 0,
  },
};

export function resolveProfile(
  name: ProfileName,
  taxPercentOverride?: number,
): InvoiceProfile {
  const profile = PROFILES[name];
  if (taxPercentOverride === undefined) {
    return profile;
  }
  return { ...profile, defaultTaxPercent: taxPercentOverride };
}

export function profileFromConfig(configService: ConfigService): InvoiceProfile {
  const name = configService.get<ProfileName>('INVOICE_PROFILE', 'relaxed');
  const taxPercent = configService.get<number>('DEFAULT_TAX_PERCENT');
  return resolveProfile(name, taxPercent);
}
