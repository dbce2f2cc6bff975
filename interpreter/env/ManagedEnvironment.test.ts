import { describe, it, expect, afterEach, vi } from 'vitest';
import { GlobalStore } from '@core/policy/EnvironmentStore';
import { DisposedError } from '@core/errors/DisposedError';
import { NoEnvironmentError } from '@core/errors/NoEnvironmentError';
import { createHarness, type Harness } from '@tests/utils/harness';
import { EnvironmentLeakTracker, LEAK_WARNING_CODE, leakTracker } from './LeakTracker';
import { useInline } from './useInline';

describe('ManagedEnvironment', () => {
  let harness: Harness;

  afterEach(() => {
    harness.teardown();
    vi.restoreAllMocks();
  });

  describe('use', () => {
    it('restores the previous environment, however the block exits', () => {
      harness = createHarness(new GlobalStore());
      const { host } = harness;
      const outer = harness.environment();
      const inner = harness.environment();

      outer.use(() => {
        expect(host.currentEnvironment()).toBe(outer.handle);
        expect(() =>
          inner.use(() => {
            expect(host.currentEnvironment()).toBe(inner.handle);
            throw new Error('inner failure');
          })
        ).toThrow('inner failure');
        expect(host.currentEnvironment()).toBe(outer.handle);
      });

      expect(host.currentEnvironment()).toBeUndefined();
    });

    it('returns the value of the block', () => {
      harness = createHarness(new GlobalStore());
      const environment = harness.environment();
      expect(environment.use(() => 'value')).toBe('value');
    });

    it('keeps the environment current until an async block settles', async () => {
      harness = createHarness();
      const { host } = harness;
      const environment = harness.environment();

      const seen = await environment.useAsync(async () => {
        await new Promise(resolve => setImmediate(resolve));
        return host.currentEnvironment();
      });

      expect(seen).toBe(environment.handle);
      expect(host.currentEnvironment()).toBeUndefined();
    });
  });

  it('switches without restoring', () => {
    harness = createHarness(new GlobalStore());
    const first = harness.environment();
    const second = harness.environment();

    first.switch();
    second.switch();

    expect(harness.host.currentEnvironment()).toBe(second.handle);
  });

  it('reads outputs and core without switching', () => {
    harness = createHarness(new GlobalStore());
    const { host } = harness;
    const environment = harness.environment();
    environment.use(() => host.execute('setOutput("frame")', host.createModule('writer')));

    expect(environment.outputs).toEqual(new Map([[0, 'frame']]));
    expect(environment.core.id).toBe(environment.handle.id);
    expect(host.currentEnvironment()).toBeUndefined();
  });

  it('makes the environment current inside an inline section only', () => {
    harness = createHarness(new GlobalStore());
    const { host } = harness;
    const environment = harness.environment();

    expect(environment.inlineSection(() => host.currentEnvironment())).toBe(environment.handle);
    expect(harness.policy.store.get()).toBeUndefined();
  });

  describe('dispose', () => {
    it('destroys the environment once', () => {
      harness = createHarness(new GlobalStore());
      const { host } = harness;
      const environment = harness.environment();
      const handle = environment.handle;

      environment.dispose();
      environment.dispose();

      expect(environment.disposed).toBe(true);
      expect(host.isAlive(handle)).toBe(false);
    });

    it('rejects use after dispose', () => {
      harness = createHarness(new GlobalStore());
      const environment = harness.environment();
      environment.dispose();

      expect(() => environment.use(() => undefined)).toThrow(DisposedError);
      expect(() => environment.switch()).toThrow('ManagedEnvironment has already been disposed');
      expect(() => environment.outputs).toThrow(DisposedError);
      expect(() => environment.handle).toThrow(DisposedError);
    });

    it('drops a disposed environment that is still current', () => {
      harness = createHarness(new GlobalStore());
      const environment = harness.environment();
      environment.switch();
      environment.dispose();

      expect(harness.host.currentEnvironment()).toBeUndefined();
    });
  });

  describe('leak reporting', () => {
    it('tracks a wrapper from creation until it is disposed', () => {
      harness = createHarness(new GlobalStore());
      const track = vi.spyOn(leakTracker, 'track');
      const untrack = vi.spyOn(leakTracker, 'untrack');

      const environment = harness.policy.newEnvironment();
      const handle = environment.handle;

      expect(track).toHaveBeenCalledWith(environment, { host: harness.host, handle });
      expect(untrack).not.toHaveBeenCalled();

      environment.dispose();
      environment.dispose();

      expect(untrack).toHaveBeenCalledTimes(1);
      expect(untrack).toHaveBeenCalledWith(environment);
    });

    it('reports a wrapper collected without dispose()', async () => {
      const collect = globalThis.gc;
      if (collect === undefined) {
        return;
      }
      harness = createHarness(new GlobalStore());
      const { host } = harness;
      const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
      const handle = (() => harness.policy.newEnvironment().handle)();

      for (let attempt = 0; attempt < 10 && host.isAlive(handle); attempt++) {
        collect();
        await new Promise(resolve => setTimeout(resolve, 10));
      }

      expect(host.isAlive(handle)).toBe(false);
      expect(emitWarning).toHaveBeenCalledWith(
        `Environment ${handle.id} was garbage collected without dispose(). This might cause leaks.`,
        { type: 'ResourceWarning', code: LEAK_WARNING_CODE }
      );
    });

    it('warns and destroys what a collected wrapper left behind', () => {
      harness = createHarness(new GlobalStore());
      const { host } = harness;
      const handle = host.createEnvironment();
      const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);

      new EnvironmentLeakTracker().reportLeak({ host, handle });

      expect(emitWarning).toHaveBeenCalledWith(
        `Environment ${handle.id} was garbage collected without dispose(). This might cause leaks.`,
        { type: 'ResourceWarning', code: LEAK_WARNING_CODE }
      );
      expect(host.isAlive(handle)).toBe(false);
    });

    it('only warns when the environment is already gone', () => {
      harness = createHarness(new GlobalStore());
      const { host } = harness;
      const handle = host.createEnvironment();
      host.disposeEnvironment(handle);
      const emitWarning = vi.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
      const dispose = vi.spyOn(host, 'disposeEnvironment');

      new EnvironmentLeakTracker().reportLeak({ host, handle });

      expect(emitWarning).toHaveBeenCalledTimes(1);
      expect(dispose).not.toHaveBeenCalled();
    });
  });
});

describe('useInline', () => {
  let harness: Harness;

  afterEach(() => {
    harness.teardown();
  });

  it('enters a managed environment', () => {
    harness = createHarness(new GlobalStore());
    const { host } = harness;
    const environment = harness.environment();

    expect(useInline('render-frames', environment, () => host.currentEnvironment(), host)).toBe(
      environment.handle
    );
  });

  it('switches to a raw handle and back', () => {
    harness = createHarness(new GlobalStore());
    const { host } = harness;
    const handle = harness.environment().handle;

    expect(useInline('render-frames', handle, () => host.currentEnvironment(), host)).toBe(handle);
    expect(host.currentEnvironment()).toBeUndefined();
  });

  it('requires a current environment without a target', () => {
    harness = createHarness(new GlobalStore());
    const { host } = harness;

    expect(() => useInline('render-frames', undefined, () => 1, host)).toThrow(
      new NoEnvironmentError('render-frames')
    );

    const environment = harness.environment();
    expect(environment.use(() => useInline('render-frames', undefined, () => 2, host))).toBe(2);
  });
});
