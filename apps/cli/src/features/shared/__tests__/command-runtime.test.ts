import { createRateRuntime, type RateRuntimeOptions } from '@ratesync/rates';
import { err, ok } from 'neverthrow';
import { describe, expect, it, vi } from 'vitest';

import { fakeSource, runtimeOptions } from '../../__tests__/helpers.js';
import { CommandContext, type RuntimeFactory } from '../command-runtime.js';

describe('CommandContext', () => {
  const options = (): RateRuntimeOptions => runtimeOptions([fakeSource('ecb', 'EUR')]);

  it('creates the runtime once and closes it after run()', async () => {
    const factory = vi.fn<RuntimeFactory>((opts) => createRateRuntime(opts));
    const context = new CommandContext(options(), factory);

    const result = await context.run(async (runtime) => {
      const again = (await context.runtime())._unsafeUnwrap();
      return ok(again === runtime);
    });

    expect(result._unsafeUnwrap()).toBe(true);
    expect(factory).toHaveBeenCalledTimes(1);
    expect((await context.runtime())._unsafeUnwrapErr().message).toBe('Command context already disposed');
  });

  it('returns the callback error', async () => {
    const context = new CommandContext(options());

    const result = await context.run(() => Promise.resolve(err(new Error('no rates'))));

    expect(result._unsafeUnwrapErr().message).toBe('no rates');
  });

  it('turns a thrown error into Err', async () => {
    const context = new CommandContext(options());

    const result = await context.run(() => Promise.reject(new Error('database is locked')));

    expect(result._unsafeUnwrapErr().message).toBe('Command failed: database is locked');
  });

  it('returns the factory error without calling the callback', async () => {
    const callback = vi.fn();
    const context = new CommandContext(options(), () => Promise.resolve(err(new Error('cannot open database'))));

    const result = await context.run(callback);

    expect(result._unsafeUnwrapErr().message).toBe('cannot open database');
    expect(callback).not.toHaveBeenCalled();
  });

  it('disposes only once', async () => {
    const runtime = (await createRateRuntime(options()))._unsafeUnwrap();
    const context = new CommandContext(options(), () => Promise.resolve(ok(runtime)));
    await context.runtime();

    expect((await context.dispose()).isOk()).toBe(true);
    expect((await context.dispose()).isOk()).toBe(true);
  });
});
