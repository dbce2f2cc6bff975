import { describe, it, expect, afterEach } from 'vitest';
import { AsyncContextStore, GlobalStore, ThreadLocalStore } from '@core/policy/EnvironmentStore';
import { Policy } from '@core/policy/Policy';
import { VmHostRuntime } from '@interpreter/host/VmHostRuntime';
import { clearLoop, fromThread, keepEnvironment, setLoop, toThread } from '@interpreter/loops/bridge';
import { NodeEventLoop } from '@interpreter/loops/NodeEventLoop';
import { loadCode } from '@interpreter/script/load';
import { getHostRuntime, setHostRuntime } from '@interpreter/host';

const tick = () => new Promise<void>(resolve => setImmediate(resolve));

describe('environments across concurrent work', () => {
  afterEach(() => {
    clearLoop();
  });

  it('runs a script end to end in a scoped policy', () => {
    const host = new VmHostRuntime();
    const policy = new Policy(new GlobalStore(), { host });

    const outputs = policy.scoped(() => {
      const environment = policy.newEnvironment();
      try {
        environment.use(() => host.execute('setOutput("hello")', host.createModule('__main__')));
        return environment.outputs;
      } finally {
        environment.dispose();
      }
    });

    expect(outputs).toEqual(new Map([[0, 'hello']]));
    expect(host.hasPolicy).toBe(false);
  });

  it('keeps sibling tasks in their own environments', async () => {
    const host = new VmHostRuntime();
    const store = new AsyncContextStore();
    const policy = new Policy(store, { host });

    await policy.scopedAsync(async () => {
      const environments = [policy.newEnvironment(), policy.newEnvironment(), policy.newEnvironment()];

      const seen = await Promise.all(
        environments.map((environment, index) =>
          store.fork(async () => {
            environment.switch();
            for (let step = 0; step <= index; step++) {
              await tick();
            }
            const script = loadCode('setOutput(core.id)', undefined, { host });
            await script;
            return host.currentEnvironment();
          })
        )
      );

      environments.forEach((environment, index) => {
        expect(seen[index]).toBe(environment.handle);
        expect(environment.outputs.get(0)).toBe(environment.handle.id);
        environment.dispose();
      });
    });
  });

  it('restores nested environments in LIFO order across failures', () => {
    const host = new VmHostRuntime();
    const policy = new Policy(new ThreadLocalStore(), { host });

    policy.scoped(() => {
      const [a, b, c] = [policy.newEnvironment(), policy.newEnvironment(), policy.newEnvironment()];
      const trail: (number | undefined)[] = [];
      const current = () => host.currentEnvironment()?.id;

      a.use(() => {
        trail.push(current());
        b.use(() => {
          trail.push(current());
          try {
            c.use(() => {
              trail.push(current());
              throw new Error('deep failure');
            });
          } catch {
            trail.push(current());
          }
        });
        trail.push(current());
      });
      trail.push(current());

      expect(trail).toEqual([a.handle.id, b.handle.id, c.handle.id, b.handle.id, a.handle.id, undefined]);
      [a, b, c].forEach(environment => environment.dispose());
    });
  });

  it('carries the caller environment onto the loop and back', async () => {
    const host = new VmHostRuntime();
    const previousHost = getHostRuntime();
    setHostRuntime(host);
    const policy = new Policy(new GlobalStore(), { host });
    setLoop(new NodeEventLoop());

    try {
      await policy.scopedAsync(async () => {
        const worker = policy.newEnvironment();
        const home = policy.newEnvironment();
        home.switch();

        // The worker's result is itself a future, which awaiting adopts
        const [onWorker, onLoop] = await worker.use(() =>
          toThread(() => {
            const onWorker = host.currentEnvironment();
            return fromThread(() => host.currentEnvironment()).map(onLoop => [onWorker, onLoop]);
          })
        );

        expect(onWorker).toBe(worker.handle);
        expect(onLoop).toBe(worker.handle);
        expect(host.currentEnvironment()).toBe(home.handle);

        const deferred = worker.use(() => keepEnvironment(() => host.currentEnvironment()));
        expect(deferred()).toBe(worker.handle);
        expect(host.currentEnvironment()).toBe(home.handle);

        worker.dispose();
        home.dispose();
      });
    } finally {
      setHostRuntime(previousHost);
    }
  });
});
