import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mock } from 'vitest-mock-extended';
import type { EnvironmentHandle, HostRuntime } from '@core/types/host';
import { AlreadyRegisteredError, NotRegisteredError, PolicyConflictError } from '@core/errors/PolicyRegistrationError';
import { HostRuntimeError } from '@core/errors/HostRuntimeError';
import { VmHostRuntime } from '@interpreter/host/VmHostRuntime';
import { ManagedEnvironment } from '@interpreter/env/ManagedEnvironment';
import { GlobalStore } from './EnvironmentStore';
import { Policy } from './Policy';

describe('Policy', () => {
  let host: VmHostRuntime;
  const policies: Policy[] = [];

  const createPolicy = () => {
    const policy = new Policy(new GlobalStore(), { host });
    policies.push(policy);
    return policy;
  };

  beforeEach(() => {
    host = new VmHostRuntime();
  });

  afterEach(() => {
    for (const policy of policies.splice(0)) {
      if (policy.registered) {
        policy.unregister();
      }
    }
  });

  describe('registration', () => {
    it('registers with and unregisters from the host', () => {
      const policy = createPolicy();
      expect(policy.registered).toBe(false);

      policy.register();
      expect(policy.registered).toBe(true);
      expect(host.hasPolicy).toBe(true);

      policy.unregister();
      expect(policy.registered).toBe(false);
      expect(host.hasPolicy).toBe(false);
    });

    it('rejects a second registration of the same policy', () => {
      const policy = createPolicy();
      policy.register();
      expect(() => policy.register()).toThrow(AlreadyRegisteredError);
    });

    it('rejects unregistering a policy that is not registered', () => {
      expect(() => createPolicy().unregister()).toThrow(NotRegisteredError);
    });

    it('allows a single policy per host runtime', () => {
      const first = createPolicy();
      const second = createPolicy();
      first.register();

      expect(() => second.register()).toThrow(PolicyConflictError);
      expect(second.registered).toBe(false);

      first.unregister();
      second.register();
      expect(second.registered).toBe(true);
    });

    it('denies API access while unregistered', () => {
      expect(() => createPolicy().api).toThrow(HostRuntimeError);
      expect(() => createPolicy().newEnvironment()).toThrow(
        'Invalid state: No access to the current API'
      );
    });

    it('forwards registration to any host runtime', () => {
      const fake = mock<HostRuntime>();
      const policy = new Policy(new GlobalStore(), { host: fake });

      policy.register();

      expect(fake.registerPolicy).toHaveBeenCalledWith(policy.managed);
      // The mock never grants an API, so the policy still counts as unregistered
      expect(policy.registered).toBe(false);
    });
  });

  describe('scoped', () => {
    it('registers for the duration of the callback', () => {
      const policy = createPolicy();
      const result = policy.scoped(p => {
        expect(p).toBe(policy);
        expect(host.hasPolicy).toBe(true);
        return 'inside';
      });

      expect(result).toBe('inside');
      expect(policy.registered).toBe(false);
    });

    it('unregisters when the callback throws', () => {
      const policy = createPolicy();
      expect(() =>
        policy.scoped(() => {
          throw new Error('scoped failure');
        })
      ).toThrow('scoped failure');
      expect(host.hasPolicy).toBe(false);
    });

    it('stays registered until an async callback settles', async () => {
      const policy = createPolicy();
      const pending = policy.scopedAsync(async () => {
        await new Promise(resolve => setImmediate(resolve));
        return host.hasPolicy;
      });

      expect(policy.registered).toBe(true);
      await expect(pending).resolves.toBe(true);
      expect(policy.registered).toBe(false);
    });
  });

  describe('newEnvironment', () => {
    it('creates environments without switching to them', () => {
      const policy = createPolicy();
      policy.register();

      const environment = policy.newEnvironment();

      expect(environment).toBeInstanceOf(ManagedEnvironment);
      expect(environment.disposed).toBe(false);
      expect(host.currentEnvironment()).toBeUndefined();
      environment.dispose();
    });
  });

  describe('current environment', () => {
    it('reports a destroyed environment as none and clears it', () => {
      const store = new GlobalStore();
      const policy = new Policy(store, { host });
      policies.push(policy);
      policy.register();

      const environment = policy.newEnvironment();
      environment.switch();
      const handle: EnvironmentHandle = environment.handle;
      expect(host.currentEnvironment()).toBe(handle);

      host.disposeEnvironment(handle);

      expect(host.currentEnvironment()).toBeUndefined();
      expect(store.get()).toBeUndefined();
      environment.dispose();
      expect(environment.disposed).toBe(true);
    });

    it('returns the previous environment from setEnvironment', () => {
      const policy = createPolicy();
      policy.register();
      const first = policy.newEnvironment();
      const second = policy.newEnvironment();

      expect(policy.managed.setEnvironment(first.handle)).toBeUndefined();
      expect(policy.managed.setEnvironment(second.handle)).toBe(first.handle);
      expect(policy.managed.setEnvironment(undefined)).toBe(second.handle);

      first.dispose();
      second.dispose();
    });

    it('prefers the inline section environment', () => {
      const policy = createPolicy();
      policy.register();
      const switched = policy.newEnvironment();
      const inline = policy.newEnvironment();
      switched.switch();

      const seen = policy.managed.inlineSection(inline.handle, () => host.currentEnvironment());

      expect(seen).toBe(inline.handle);
      expect(host.currentEnvironment()).toBe(switched.handle);
      switched.dispose();
      inline.dispose();
    });
  });
});
