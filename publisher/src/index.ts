export { SubscriptionHandle } from './handle.js'
export type { CallbackFn, Observable, WeakObservation } from './handle.js'
export { Callback } from './callback.js'
export { Publisher } from './publisher.js'
export type { IPublisher, PublishFn, PublisherChannel } from './publisher.js'
export { FailurePolicy, PublisherOptionsSchema, parsePublisherOptions } from './config.js'
export type { PublisherOptions, PublisherOptionsInput } from './config.js'
export type { PublisherEmitter, PublisherEventMap, TypedEventEmitter } from './emitter.js'
export * from './errors.js'
