import { KeyedMutex } from '../src/utils/keyedMutex';
import { sleep } from '../src/utils/retry';

jest.mock('../src/services/observabilityService', () => ({
    logger: { info: jest.fn(), debug: jest.fn(), warn: jest.fn(), error: jest.fn() }
}));

describe('KeyedMutex', () => {
    async function locked<T>(mutex: KeyedMutex, keys: string[], fn: () => Promise<T>): Promise<T> {
        const release = await mutex.acquireAll(keys);
        try {
            return await fn();
        } finally {
            release();
        }
    }

    it('should run work on the same key one at a time', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];

        const first = locked(mutex, ['lead:1'], async () => {
            order.push('first:start');
            await sleep(5);
            order.push('first:end');
        });
        const second = locked(mutex, ['lead:1'], async () => {
            order.push('second');
        });
        await Promise.all([first, second]);

        expect(order).toEqual(['first:start', 'first:end', 'second']);
    });

    it('should not block other keys', async () => {
        const mutex = new KeyedMutex();
        const order: string[] = [];
        let open: () => void = () => undefined;
        const gate = new Promise<void>((resolve) => {
            open = resolve;
        });

        const held = locked(mutex, ['lead:1'], async () => {
            await gate;
            order.push('lead:1');
        });
        await locked(mutex, ['lead:2'], async () => {
            order.push('lead:2');
        });

        open();
        await held;
        expect(order).toEqual(['lead:2', 'lead:1']);
    });

    it('should not deadlock when keys are requested in opposite order', async () => {
        const mutex = new KeyedMutex();
        const results = await Promise.all([
            locked(mutex, ['a', 'b'], async () => 'ab'),
            locked(mutex, ['b', 'a'], async () => 'ba')
        ]);
        expect(results).toEqual(['ab', 'ba']);
    });
});
