// src/adapters/http/decorators/public.decorator.ts

import { SetMetadata } from '@nestjs/common';

/**
 * 公开访问标记：未携带令牌时以匿名身份放行；携带令牌时仍会校验
 */
export const IS_PUBLIC_KEY = 'isPublic';

// eslint-disable-next-line @typescript-eslint/naming-convention
export function Public(): MethodDecorator & ClassDecorator {
  return SetMetadata(IS_PUBLIC_KEY, true);
}
