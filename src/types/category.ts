// Category Types
export type CategorySource = 'rules' | 'engine';

export interface CategoryResult {
  category: string | null;
  confidence: number;             // 0..1
  reasoning: string;
  source: CategorySource;
}

export interface CategoryInput {
  vendor?: string | null;
  ocrText?: string | null;
  explanation?: string | null;
  businessType?: string | null;
}
