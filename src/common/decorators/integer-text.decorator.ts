import { Transform } from 'class-transformer';
import { parseIntegerText } from '@/shared/utils/normalize.util';

/** For integers that arrive as text, e.g. in a query string. */
export const IntegerText = (): PropertyDecorator =>
  Transform(({ value }) => parseIntegerText(value));
