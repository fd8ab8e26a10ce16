import type { GateDecision, OperationKind } from './types.js'

export type EventMap = {
    'gate:decision': { kind: OperationKind; target: string; decision: GateDecision }
    'session:closed': { directory: string; written: string[]; failed: string[] }
    'artifact:failed': { artifact: string; error: string }
}

type EventHandler<T> = (data: T) => void

export class TypedEventEmitter {
    private handlers: { [K in keyof EventMap]?: Set<EventHandler<EventMap[K]>> } = {}

    on<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        const set: Set<EventHandler<EventMap[K]>> = this.handlers[event] ?? new Set()
        set.add(handler)
        this.handlers[event] = set
    }

    off<K extends keyof EventMap>(event: K, handler: EventHandler<EventMap[K]>): void {
        this.handlers[event]?.delete(handler)
    }

    emit<K extends keyof EventMap>(event: K, data: EventMap[K]): void {
        const set = this.handlers[event]
        if (!set) return
        for (const handler of set) {
            try {
                handler(data)
            } catch {
                // cross-cutting listeners should not crash the main flow
            }
        }
    }

    removeAll(): void {
        this.handlers = {}
    }
}
