/**
 * Lightweight state primitives: subscriptions and atoms.
 */

export type Unsubscribe = () => void

/**
 * Create a subscription channel for a payload type.
 * Subscribers added or removed while a notify is running take effect on the
 * next notify.
 */
export function createSubscription<TPayload>() {
  const subscribers = new Set<(payload: TPayload) => void>()

  return {
    subscribe: (callback: (payload: TPayload) => void): Unsubscribe => {
      subscribers.add(callback)
      return () => {
        subscribers.delete(callback)
      }
    },
    /** Subscribe for the next payload only */
    once: (callback: (payload: TPayload) => void): Unsubscribe => {
      const wrapped = (payload: TPayload) => {
        subscribers.delete(wrapped)
        callback(payload)
      }
      subscribers.add(wrapped)
      return () => {
        subscribers.delete(wrapped)
      }
    },
    notify: (payload: TPayload) => {
      Array.from(subscribers).forEach((callback) => callback(payload))
    },
    clear: () => {
      subscribers.clear()
    },
    size: () => subscribers.size,
  }
}

export type Subscription<TPayload> = ReturnType<
  typeof createSubscription<TPayload>
>

/**
 * Create a state atom with subscriptions.
 * Subscribers only hear about actual changes (compared with Object.is).
 */
export function createAtom<T>(initialState: T) {
  let state = initialState
  const stateSubscription = createSubscription<T>()

  const set = (newState: T) => {
    if (Object.is(newState, state)) return
    state = newState
    stateSubscription.notify(state)
  }

  return {
    get: () => state,
    update: (updater: (state: T) => T) => set(updater(state)),
    set,
    subscribe: (callback: (state: T) => void): Unsubscribe =>
      stateSubscription.subscribe(callback),
  }
}

export type Atom<T> = ReturnType<typeof createAtom<T>>
