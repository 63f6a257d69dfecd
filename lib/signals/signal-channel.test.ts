import { describe, expect, it } from 'vitest';
import { SignalChannel } from './signal-channel';

describe('SignalChannel', () => {
    it('hands items to a waiting consumer in order', async () => {
        const channel = new SignalChannel<number>();
        const first = channel.next();
        channel.push(1);
        channel.push(2);

        expect(await first).toBe(1);
        expect(channel.drain()).toEqual([2]);
    });

    it('returns null once closed and empty', async () => {
        const channel = new SignalChannel<string>();
        channel.push('a');
        channel.close();

        expect(await channel.next()).toBe('a');
        expect(await channel.next()).toBeNull();
        expect(channel.push('b')).toBe(false);
    });

    it('returns null when the signal aborts', async () => {
        const channel = new SignalChannel<string>();
        const controller = new AbortController();
        const pending = channel.next(controller.signal);
        controller.abort();

        expect(await pending).toBeNull();
    });
});
