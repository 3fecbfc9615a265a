export type QcheckConfig = {
  /** Path of the unit file holding `{ "definitions": [...] }`. */
  unit: string;
  /** Print the checked, typed definitions as JSON. */
  emitTyped?: boolean;
  /** Specialize every root and print the concrete program. */
  monomorphise?: boolean;
  maxSpecializationDepth?: number;
  /** Stop at the first rejected definition. */
  failFast?: boolean;
  color: boolean;
};
