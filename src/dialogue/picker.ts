/** Chooses one template among a non-empty set of variants. */
export type VariantPicker = (variants: readonly string[]) => string;

export const randomPicker: VariantPicker = (variants) => {
  const index = Math.floor(Math.random() * variants.length);
  return variants[Math.min(index, variants.length - 1)] ?? '';
};

export function fixedPicker(index = 0): VariantPicker {
  return (variants) => variants[Math.min(Math.max(index, 0), variants.length - 1)] ?? '';
}
