export const trimText = (value: string): string => value.trim();

export const trimOptional = (value: string | undefined): string | undefined => value?.trim();

export const trimList = (values: readonly string[] | undefined): string[] | undefined =>
  values?.map((value) => value.trim());

/**
 * Trims strings and hands every other value back untouched, so that a wrong type
 * still reaches the validator instead of being coerced here.
 */
export const trimUnknown = (value: unknown): unknown =>
  typeof value === 'string' ? value.trim() : value;

/** Converts decimal integer text to a number. Anything else is returned as is. */
export const parseIntegerText = (value: unknown): unknown =>
  typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value) : value;
