import { Callback, IPublisher, Publisher, SubscriptionHandle } from './src/index.js'
import { makeLog } from './src/log.js'

type Signature = [number, string]

const log = makeLog('example')

/**
 * Owns a publisher and is the only one able to trigger it.
 */
export class Primary implements IPublisher<Signature> {
  private readonly channel = Publisher.make<Signature>({ label: 'primary' })

  subscribe: IPublisher<Signature>['subscribe'] = (target) =>
    this.channel.publisher.subscribe(target)

  subscriberCount = () => this.channel.publisher.subscriberCount()

  doSomething(a: number, b: string) {
    this.channel.publish(a, b)
  }
}

/**
 * Listens to a publisher and ends its own participation after the first
 * publication it receives.
 */
export class Client {
  readonly received: Signature[] = []

  // Lives exactly as long as this client takes part.
  private readonly subscription: SubscriptionHandle<Signature> = Callback.bind(this, this.handler)

  constructor(source: IPublisher<Signature>) {
    source.subscribe(this.subscription)
  }

  get id(): symbol {
    return this.subscription.id
  }

  isDestroyed = (): boolean => this.subscription.isReleased()

  addDestroyHook = (hook: () => unknown): void => this.subscription.addExpireHook(hook)

  private handler(a: number, b: string) {
    log.info(`handler: a=${a}, b=${b}`)
    this.received.push([a, b])
    this.subscription.release()
  }
}

/**
 * Keeps clients alive by id. A client drops out of the registry as soon as
 * its subscription expires.
 */
export class ClientRegistry {
  private readonly clients = new Map<symbol, Client>()

  spawn(source: IPublisher<Signature>): Client {
    const client = new Client(source)
    this.clients.set(client.id, client)
    client.addDestroyHook(() => this.clients.delete(client.id))
    return client
  }

  size(): number {
    return this.clients.size
  }

  has(client: Client): boolean {
    return this.clients.has(client.id)
  }
}

export const runExample = (clientCount = 3) => {
  const primary = new Primary()
  const registry = new ClientRegistry()
  for (let i = 0; i < clientCount; i += 1) {
    registry.spawn(primary)
  }

  primary.doSomething(42, 'first')
  const afterFirst = { clients: registry.size(), subscribers: primary.subscriberCount() }

  primary.doSomething(43, 'second')
  const afterSecond = { clients: registry.size(), subscribers: primary.subscriberCount() }

  log.info('after first publication', afterFirst, 'after second', afterSecond)
  return { afterFirst, afterSecond }
}
