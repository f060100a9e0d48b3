// src/adapters/http/dto.transforms.ts
import { Transform } from 'class-transformer';

/**
 * 字符串去首尾空白；非字符串原样返回，交给后续校验报错
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export const Trim = (): PropertyDecorator =>
  Transform(({ value }: { value: unknown }) => (typeof value === 'string' ? value.trim() : value));

export const REQUIRED_MESSAGE = 'This field is required.';
