import { SequenceLock } from './sequence-lock.service';

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('SequenceLock', () => {
  it('runs tasks for one key strictly one after another', async () => {
    const lock = new SequenceLock();
    const issued: number[] = [];
    let counter = 0;

    const next = () =>
      lock.run('rfis:t1:p1', async () => {
        const current = counter;
        await tick();
        counter = current + 1;
        issued.push(counter);
        return counter;
      });

    await expect(Promise.all([next(), next(), next()])).resolves.toEqual([1, 2, 3]);
    expect(issued).toEqual([1, 2, 3]);
  });

  it('keeps going after a task fails', async () => {
    const lock = new SequenceLock();
    const failed = lock.run('k', async () => {
      throw new Error('duplicate');
    });
    const after = lock.run('k', async () => 'ok');

    await expect(failed).rejects.toThrow('duplicate');
    await expect(after).resolves.toBe('ok');
  });

  it('does not hold up other keys', async () => {
    const lock = new SequenceLock();
    const order: string[] = [];
    let releaseA: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      releaseA = resolve;
    });

    const a = lock.run('a', async () => {
      await gate;
      order.push('a');
    });
    const b = lock.run('b', async () => {
      order.push('b');
    });

    await b;
    releaseA();
    await a;
    expect(order).toEqual(['b', 'a']);
  });
});
