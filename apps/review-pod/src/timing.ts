/**
 * Wait for `work` but give up after `ms`
 * @returns true if the work settled in time
 */
export async function settleWithin(work: Promise<unknown>, ms: number): Promise<boolean> {
    let timer: NodeJS.Timeout | undefined;
    const expired = new Promise<boolean>(resolve => {
        timer = setTimeout(() => resolve(false), ms);
        timer.unref();
    });
    try {
        return await Promise.race([work.then(() => true, () => true), expired]);
    } finally {
        clearTimeout(timer);
    }
}
