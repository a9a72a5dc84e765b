export class WeakPublisherError extends Error {
  // https://stackoverflow.com/questions/41102060/typescript-extending-error-class
  constructor(message?: string) {
    super(message)
    this.name = 'WeakPublisherError'
    Object.setPrototypeOf(this, WeakPublisherError.prototype)
  }
}

/**
 * Thrown when a strong reference is used after `release()` was called on it.
 */
export class SubscriptionHandleReleasedError extends WeakPublisherError {
  constructor(message?: string) {
    super(message)
    this.name = 'SubscriptionHandleReleasedError'
    Object.setPrototypeOf(this, SubscriptionHandleReleasedError.prototype)
  }
}

export class CallbackBindingError extends WeakPublisherError {
  constructor(message?: string) {
    super(message)
    this.name = 'CallbackBindingError'
    Object.setPrototypeOf(this, CallbackBindingError.prototype)
  }
}

export class PublisherConfigError extends WeakPublisherError {
  constructor(message?: string) {
    super(message)
    this.name = 'PublisherConfigError'
    Object.setPrototypeOf(this, PublisherConfigError.prototype)
  }
}

/**
 * Wraps an error thrown by a subscriber's callback when the publisher runs
 * with the `isolate` failure policy.
 */
export class PublisherCallbackFailure extends WeakPublisherError {
  constructor(
    message: string,
    public readonly handleId: symbol,
    public readonly error: unknown,
  ) {
    super(message)
    this.name = 'PublisherCallbackFailure'
    Object.setPrototypeOf(this, PublisherCallbackFailure.prototype)
  }
}
