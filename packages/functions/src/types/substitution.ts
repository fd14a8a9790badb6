export interface SubstitutionOption {
  ingredient: string;
  /** Multiplier applied to the required quantity of the original ingredient. */
  ratio: number;
  notes: string;
}
