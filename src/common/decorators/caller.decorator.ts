import { createParamDecorator, ExecutionContext, UnauthorizedException } from '@nestjs/common';
import { normalizeAddress } from '../addresses';

export const CALLER_HEADER = 'x-account';

export function resolveCaller(header: string | string[] | undefined): string {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value) {
    throw new UnauthorizedException(`Missing ${CALLER_HEADER} header`);
  }
  return normalizeAddress(value, CALLER_HEADER);
}

// Address of the account on whose behalf the request is made.
export const Caller = createParamDecorator((_data: unknown, ctx: ExecutionContext): string => {
  const request = ctx.switchToHttp().getRequest<{ headers: Record<string, string | string[] | undefined> }>();
  return resolveCaller(request.headers[CALLER_HEADER]);
});
