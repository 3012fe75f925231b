import { Transform } from 'class-transformer';
import { trimUnknown } from '@/shared/utils/normalize.util';

export const Trim = (): PropertyDecorator => Transform(({ value }) => trimUnknown(value));
