/**
 * Event bus carrying registry lifecycle notifications.
 */
import { EventEmitter } from 'events';
import { EVENT_NAMES, type EventName } from '../Domain/Utility.js';

/** Payload describing one object entering or leaving a context. */
export interface ObjectEventPayload {
    className: string;
    name: string;
    id: number;
    context: string;
}

/** Payload describing a context-wide operation. */
export interface ContextEventPayload {
    context: string;
    /** Number of objects dropped by the operation. */
    removed: number;
}

/** Payload type per event name. */
export interface RegistryEventMap {
    [EVENT_NAMES.objectRegistered]: ObjectEventPayload;
    [EVENT_NAMES.objectRemoved]: ObjectEventPayload;
    [EVENT_NAMES.contextCleared]: ContextEventPayload;
    [EVENT_NAMES.contextRemoved]: ContextEventPayload;
}

/**
 * RegistryEventBus is a typed wrapper around EventEmitter. Each ContextRegistry owns one.
 * @example
 * registry.Events.On('object.registered', payload => console.log(payload.name));
 */
export class RegistryEventBus extends EventEmitter {
    /** Typed emit helper enforcing known event names. */
    public Emit<T extends EventName>(eventName: T, payload: RegistryEventMap[T]): boolean {
        return super.emit(eventName, payload);
    }
    /** Typed on helper enforcing known event names. */
    public On<T extends EventName>(eventName: T, listener: (payload: RegistryEventMap[T]) => void): this {
        super.on(eventName, listener);
        return this;
    }
    /** Removes a listener added with On. */
    public Off<T extends EventName>(eventName: T, listener: (payload: RegistryEventMap[T]) => void): this {
        super.off(eventName, listener);
        return this;
    }
}
