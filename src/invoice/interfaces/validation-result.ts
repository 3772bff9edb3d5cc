import { RequiredField } from '../types/invoice.types';

export interface ValidationResult {
  missing: RequiredField[];
  suggestions: string[];
  complete: boolean;
}
