export interface FearGreedIndex {
  value: number;
  classification: string;
  updatedAt: string | null;
}
