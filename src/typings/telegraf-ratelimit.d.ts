declare module 'telegraf-ratelimit' {
  import type { Context, MiddlewareFn } from 'telegraf';

  namespace rateLimit {
    interface Options {
      window?: number;
      limit?: number;
      keyGenerator?: (ctx: Context) => string;
      onLimitExceeded?: (ctx: Context, next: () => Promise<void>) => unknown;
    }
  }

  function rateLimit(options?: rateLimit.Options): MiddlewareFn<Context>;

  export = rateLimit;
}
