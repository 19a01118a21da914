import { EventEmitter } from 'node:events';

import { afterEach, describe, expect, it, vi } from 'vitest';
import type { Request, Response } from 'express';
import { BroadcastChannel } from '@synapse/runtime';
import { FakeLogger } from '@synapse/testing';
import { SseEventStream } from '../src/sse-stream';

function mockConnection() {
    const emitter = new EventEmitter();
    let accepting = true;
    const write = vi.fn((_frame: string) => accepting);
    const end = vi.fn();
    const setHeader = vi.fn();
    const res = Object.assign(emitter, { statusCode: 0, setHeader, write, end }) as unknown as Response;
    const req = {} as unknown as Request;
    return {
        req,
        res,
        write,
        end,
        setHeader,
        disconnect: () => emitter.emit('close'),
        stall: () => {
            accepting = false;
        },
        drain: () => {
            accepting = true;
            emitter.emit('drain');
        },
    };
}

function writes(write: { mock: { calls: ReadonlyArray<ReadonlyArray<unknown>> } }): unknown[] {
    return write.mock.calls.map((call) => call[0]);
}

describe('SseEventStream', () => {
    afterEach(() => {
        vi.useRealTimers();
    });

    it('opens an event stream and writes broadcast values as data frames', async () => {
        const channel = new BroadcastChannel<string>(8);
        const stream = new SseEventStream({ source: channel, logger: new FakeLogger() });
        const { req, res, write, setHeader } = mockConnection();

        stream.handleConnection(req, res);
        channel.send('{"original_task_id":"t1"}');

        expect(res.statusCode).toBe(200);
        expect(setHeader).toHaveBeenCalledWith('Content-Type', 'text/event-stream; charset=utf-8');
        await vi.waitFor(() =>
            expect(writes(write)).toEqual([': connected\n\n', 'data: {"original_task_id":"t1"}\n\n'])
        );
    });

    it('sends a lag notice and then continues with retained values', async () => {
        const channel = new BroadcastChannel<string>(2);
        const logger = new FakeLogger();
        const stream = new SseEventStream({ source: channel, logger });
        const { req, res, write } = mockConnection();

        stream.handleConnection(req, res);
        for (let i = 0; i < 5; i++) {
            channel.send(`"v${i}"`);
        }

        await vi.waitFor(() =>
            expect(writes(write)).toEqual([
                ': connected\n\n',
                'event: lagged\ndata: {"skipped":3}\n\n',
                'data: "v3"\n\n',
                'data: "v4"\n\n',
            ])
        );
        expect(logger.entries('warn', 'SSE client lagged, events skipped')[0]?.obj).toEqual({
            clientId: expect.any(String),
            skipped: 3,
        });
    });

    it('stops reading while the socket is full so a stalled client lags at the channel', async () => {
        const channel = new BroadcastChannel<string>(2);
        const logger = new FakeLogger();
        const stream = new SseEventStream({ source: channel, logger });
        const { req, res, write, stall, drain } = mockConnection();

        stream.handleConnection(req, res);
        stall();
        channel.send('"v0"');
        await vi.waitFor(() => expect(writes(write)).toEqual([': connected\n\n', 'data: "v0"\n\n']));

        for (let i = 1; i <= 5; i++) {
            channel.send(`"v${i}"`);
            await new Promise((resolve) => setImmediate(resolve));
        }
        expect(writes(write)).toHaveLength(2);

        drain();
        await vi.waitFor(() =>
            expect(writes(write)).toEqual([
                ': connected\n\n',
                'data: "v0"\n\n',
                'event: lagged\ndata: {"skipped":3}\n\n',
                'data: "v4"\n\n',
                'data: "v5"\n\n',
            ])
        );

        channel.send('"v6"');
        await vi.waitFor(() => expect(writes(write).at(-1)).toBe('data: "v6"\n\n'));
        expect(logger.entries('warn', 'SSE client lagged, events skipped')).toHaveLength(1);
    });

    it('ends the pump when a stalled client disconnects', async () => {
        const channel = new BroadcastChannel<string>(2);
        const stream = new SseEventStream({ source: channel, logger: new FakeLogger() });
        const { req, res, write, end, stall, disconnect } = mockConnection();

        stream.handleConnection(req, res);
        stall();
        channel.send('"v0"');
        await vi.waitFor(() => expect(writes(write)).toHaveLength(2));

        disconnect();
        channel.send('"v1"');
        await new Promise((resolve) => setImmediate(resolve));

        expect(stream.clientCount).toBe(0);
        expect(channel.receiverCount).toBe(0);
        expect(writes(write)).toHaveLength(2);
        expect(end).not.toHaveBeenCalled();
    });

    it('writes keep-alive comments on the configured interval', async () => {
        vi.useFakeTimers();
        const channel = new BroadcastChannel<string>(2);
        const stream = new SseEventStream({ source: channel, logger: new FakeLogger(), keepAliveMs: 15_000 });
        const { req, res, write } = mockConnection();

        stream.handleConnection(req, res);
        await vi.advanceTimersByTimeAsync(30_000);

        expect(writes(write)).toEqual([': connected\n\n', ': keep-alive\n\n', ': keep-alive\n\n']);
    });

    it('releases the receiver when the client disconnects', () => {
        const channel = new BroadcastChannel<string>(2);
        const stream = new SseEventStream({ source: channel, logger: new FakeLogger() });
        const { req, res, disconnect } = mockConnection();

        stream.handleConnection(req, res);
        expect(channel.receiverCount).toBe(1);
        expect(stream.clientCount).toBe(1);

        disconnect();

        expect(channel.receiverCount).toBe(0);
        expect(stream.clientCount).toBe(0);
    });

    it('ends every stream on close', () => {
        const channel = new BroadcastChannel<string>(2);
        const stream = new SseEventStream({ source: channel, logger: new FakeLogger() });
        const first = mockConnection();
        const second = mockConnection();

        stream.handleConnection(first.req, first.res);
        stream.handleConnection(second.req, second.res);
        stream.close();

        expect(first.end).toHaveBeenCalledTimes(1);
        expect(second.end).toHaveBeenCalledTimes(1);
        expect(channel.receiverCount).toBe(0);
    });

    it('ends the response when the channel closes', async () => {
        const channel = new BroadcastChannel<string>(2);
        const stream = new SseEventStream({ source: channel, logger: new FakeLogger() });
        const { req, res, end } = mockConnection();

        stream.handleConnection(req, res);
        channel.close();

        await vi.waitFor(() => expect(end).toHaveBeenCalledTimes(1));
        expect(stream.clientCount).toBe(0);
    });
});
