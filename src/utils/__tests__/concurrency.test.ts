import { runBounded, runConcurrent } from '../concurrency';

function delay(ms: number): Promise<void> {
    return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('runConcurrent', () => {
    it('keeps results in input order whatever the completion order', async () => {
        const results = await runConcurrent([30, 5, 15, 0], 2, async (ms, index) => {
            await delay(ms);
            return `${index}:${ms}`;
        });

        expect(results).toEqual(['0:30', '1:5', '2:15', '3:0']);
    });

    it('never has more than the pool size in flight', async () => {
        let inFlight = 0;
        let peak = 0;

        await runConcurrent(Array.from({ length: 10 }, (_, i) => i), 3, async (i) => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await delay(i % 3);
            inFlight--;
        });

        expect(peak).toBe(3);
    });

    it('stops pulling items after the first failure', async () => {
        const started: number[] = [];

        await expect(
            runConcurrent([1, 2, 3, 4, 5], 1, async (item) => {
                started.push(item);
                if (item === 2) {
                    throw new Error('item 2 failed');
                }
                return item;
            })
        ).rejects.toThrow('item 2 failed');
        expect(started).toEqual([1, 2]);
    });

    it('rejects once the signal is aborted', async () => {
        const controller = new AbortController();
        const seen: number[] = [];

        await expect(
            runConcurrent(
                [1, 2, 3],
                1,
                async (item) => {
                    seen.push(item);
                    controller.abort();
                },
                controller.signal
            )
        ).rejects.toThrow('This operation was aborted');
        expect(seen).toEqual([1]);
    });

    it('returns an empty list for no items', async () => {
        const fn = jest.fn();

        await expect(runConcurrent([], 4, fn)).resolves.toEqual([]);
        expect(fn).not.toHaveBeenCalled();
    });
});

describe('runBounded', () => {
    it('starts every item at once when the bound is 0', async () => {
        let inFlight = 0;
        let peak = 0;

        await runBounded([1, 2, 3, 4, 5, 6], 0, async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await delay(5);
            inFlight--;
        });

        expect(peak).toBe(6);
    });

    it('delegates to the pool for a positive bound', async () => {
        let inFlight = 0;
        let peak = 0;

        await runBounded([1, 2, 3, 4], 2, async () => {
            inFlight++;
            peak = Math.max(peak, inFlight);
            await delay(5);
            inFlight--;
        });

        expect(peak).toBe(2);
    });
});
