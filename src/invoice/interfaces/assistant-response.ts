import { RequiredField } from '../types/invoice.types';

export type AssistantResponseType = 'info' | 'warning' | 'invoice';

export interface AssistantResponse {
  text: string;
  type: AssistantResponseType;
  // Only set when type is 'invoice' and the record was saved
  savedInvoiceId?: string;
  saveFailed?: boolean;
  missingFields?: RequiredField[];
}
