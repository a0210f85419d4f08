/**
 * Central enumeration of well-known event names for typed event bus helpers.
 */
export const EVENT_NAMES = {
    objectRegistered: 'object.registered',
    objectRemoved: 'object.removed',
    contextCleared: 'context.cleared',
    contextRemoved: 'context.removed',
} as const;

/** Type union of event string literals. */
export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
