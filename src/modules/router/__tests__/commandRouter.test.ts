import { describe, it, expect, beforeEach, vi, type Mock } from 'vitest'
import { CommandRouter } from '../commandRouter'
import { ShutdownSignal } from '../../../core/shutdown'
import type { Actuator } from '../../../core/types/device'
import { DuplicateRouteError, RoutesLockedError } from '../../../lib/errors'
import { createMsg } from '../../messenger/service'
import { MemoryMessenger, createTestLogger, deferred, type LogEntry } from '../../../__tests__/helpers'

type ActuatorHandler = (payload: Buffer) => Promise<void>

const actuatorOf = (name: string, handleMessage: (payload: Buffer) => Promise<void>): Actuator => ({
    name,
    kind: 'actuator',
    handleMessage,
})

describe('CommandRouter', () => {
    let messenger: MemoryMessenger
    let shutdown: ShutdownSignal
    let entries: LogEntry[]
    let pumpHandler: Mock<ActuatorHandler>
    let lcdHandler: Mock<ActuatorHandler>
    let router: CommandRouter

    beforeEach(() => {
        messenger = new MemoryMessenger()
        shutdown = new ShutdownSignal()
        const test = createTestLogger()
        entries = test.entries
        pumpHandler = vi.fn<ActuatorHandler>(async () => {})
        lcdHandler = vi.fn<ActuatorHandler>(async () => {})
        router = new CommandRouter(messenger, shutdown, test.logger, {
            routes: [
                { topic: 'c/pump', actuator: actuatorOf('pump', pumpHandler) },
                { topic: 'c/lcd', actuator: actuatorOf('display', lcdHandler) },
            ],
        })
    })

    describe('route', () => {
        it('should return a handler for a mapped topic', () => {
            expect(router.route('c/pump')).toBeTypeOf('function')
        })

        it('should return undefined for an unmapped topic', () => {
            expect(router.route('c/valve')).toBeUndefined()
        })

        it('should reject a topic bound twice', () => {
            expect(() => router.addRoute('c/pump', actuatorOf('other', async () => {}))).toThrow(DuplicateRouteError)
        })
    })

    describe('handleMessage', () => {
        it('should invoke only the pump handler with the original payload', async () => {
            const payload = Buffer.from([0x6f, 0x6e, 0x00, 0xff])

            await router.handleMessage(createMsg('c/pump', payload))

            expect(pumpHandler).toHaveBeenCalledTimes(1)
            expect(pumpHandler.mock.calls[0][0]).toEqual(payload)
            expect(lcdHandler).not.toHaveBeenCalled()
        })

        it('should log an unknown topic and actuate nothing', async () => {
            await router.handleMessage(createMsg('c/valve', 'open'))

            expect(pumpHandler).not.toHaveBeenCalled()
            expect(lcdHandler).not.toHaveBeenCalled()
            expect(entries.find(e => e.msg === '[ROUTER] Unknown topic c/valve')).toMatchObject({
                level: 40,
                topic: 'c/valve',
            })
        })

        it('should isolate a failing handler', async () => {
            pumpHandler.mockRejectedValueOnce(new Error('relay stuck'))

            await expect(router.handleMessage(createMsg('c/pump', 'on'))).resolves.toBeUndefined()
            await router.handleMessage(createMsg('c/pump', 'off'))

            expect(pumpHandler).toHaveBeenCalledTimes(2)
            expect(entries.find(e => e.msg === '[ROUTER] Handler failed for c/pump')).toMatchObject({
                level: 50,
                device: 'pump',
                error: 'relay stuck',
            })
        })

        it('should drop messages after shutdown', async () => {
            shutdown.trigger()

            await router.handleMessage(createMsg('c/pump', 'on'))

            expect(pumpHandler).not.toHaveBeenCalled()
        })
    })

    describe('subscriptions', () => {
        it('should subscribe each routed topic on start', async () => {
            await router.start()

            expect(router.state).toBe('subscribed')
            expect(messenger.subscriptions.map(s => s.filter)).toEqual(['c/pump', 'c/lcd'])
        })

        it('should subscribe only once when started twice', async () => {
            await router.start()
            await router.start()

            expect(messenger.subscriptions).toHaveLength(2)
        })

        it('should dispatch bus deliveries to the bound actuator', async () => {
            await router.start()

            await messenger.deliver('c/lcd', 'hello')

            expect(lcdHandler).toHaveBeenCalledWith(Buffer.from('hello'))
            expect(pumpHandler).not.toHaveBeenCalled()
        })

        it('should use explicit filters and log unknown control topics', async () => {
            const test = createTestLogger()
            const wildcard = new CommandRouter(messenger, shutdown, test.logger, {
                routes: [{ topic: 'c/pump', actuator: actuatorOf('pump', pumpHandler) }],
                filters: ['c/#'],
            })
            await wildcard.start()

            await messenger.deliver('c/pump', 'on')
            await messenger.deliver('c/sprinkler', 'on')

            expect(messenger.subscriptions.map(s => s.filter)).toEqual(['c/#'])
            expect(pumpHandler).toHaveBeenCalledTimes(1)
            expect(test.entries.some(e => e.msg === '[ROUTER] Unknown topic c/sprinkler')).toBe(true)
        })

        it('should unsubscribe everything on stop', async () => {
            await router.start()
            await router.stop()

            expect(router.state).toBe('unsubscribed')
            expect(messenger.subscriptions).toEqual([])
        })

        it('should refuse new routes once started', async () => {
            await router.start()

            expect(() => router.addRoute('c/valve', actuatorOf('valve', async () => {}))).toThrow(RoutesLockedError)
            expect(() => router.addRoute('c/valve', actuatorOf('valve', async () => {}))).toThrow(
                'Cannot add route c/valve after the router has started'
            )
        })

        it('should drop a subscription that completes after stop', async () => {
            const gate = deferred()
            messenger.subscribeGate = gate.promise

            const starting = router.start()
            await router.stop()
            gate.resolve()
            await starting

            expect(router.state).toBe('unsubscribed')
            expect(messenger.subscriptions).toEqual([])
        })

        it('should only log messages on monitored filters', async () => {
            const test = createTestLogger()
            const monitored = new CommandRouter(messenger, shutdown, test.logger, {
                routes: [{ topic: 'c/pump', actuator: actuatorOf('pump', pumpHandler) }],
                filters: ['c/#'],
                monitor: ['d/#'],
            })
            await monitored.start()

            await messenger.deliver('d/soil', ' 0.30')

            expect(messenger.subscriptions.map(s => s.filter)).toEqual(['c/#', 'd/#'])
            expect(pumpHandler).not.toHaveBeenCalled()
            expect(test.entries).toContainEqual(
                expect.objectContaining({ level: 20, msg: '[ROUTER] d/soil', direction: 'IN', payload: ' 0.30' })
            )
            expect(test.entries.some(e => e.msg === '[ROUTER] Unknown topic d/soil')).toBe(false)
        })
    })
})
