export type ThrottleProfile = {
    maxRps: number;
    maxConcurrency: number;
};

const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

// Task n may not start before `n / maxRps` seconds after the first one.
const createStartSchedule = (maxRps: number) => {
    if (maxRps <= 0) {
        return async () => {};
    }
    const intervalMs = 1000 / maxRps;
    let firstStart: number | undefined;
    let issued = 0;
    return async () => {
        const now = Date.now();
        if (firstStart === undefined) {
            firstStart = now;
        }
        const due = firstStart + issued * intervalMs;
        issued += 1;
        if (due > now) {
            await sleep(due - now);
        }
    };
};

/**
 * Runs `worker` over `items` with at most `maxConcurrency` in flight and
 * task starts spaced by `maxRps` (0 means unthrottled). Results keep input
 * order.
 */
export const mapWithConcurrency = async <T, R>(
    items: readonly T[],
    profile: ThrottleProfile,
    worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
    const results = new Array<R>(items.length);
    if (items.length === 0) {
        return results;
    }
    const waitForSlot = createStartSchedule(profile.maxRps);
    const concurrency = Math.max(1, Math.min(profile.maxConcurrency, items.length));
    let cursor = 0;
    const runners = Array.from({length: concurrency}, async () => {
        while (cursor < items.length) {
            const index = cursor;
            cursor += 1;
            await waitForSlot();
            results[index] = await worker(items[index], index);
        }
    });
    await Promise.all(runners);
    return results;
};
