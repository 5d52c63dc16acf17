// Async channel: many producers, one consumer.
//
// Background tasks (socket handlers, transport callbacks, data channel
// listeners) push values with `send`; the consumer awaits `recv`. Closing
// wakes every waiter with null once the buffer has drained.

export interface Channel<T> {
  send(value: T): boolean
  recv(signal?: AbortSignal): Promise<T | null>
  close(): void
  isClosed(): boolean
  size(): number
}

interface Waiter<T> {
  resolve(value: T | null): void
  detach(): void
}

interface ChannelState<T> {
  buffer: T[]
  closed: boolean
  waiters: Waiter<T>[]
}

export function createChannel<T>(): Channel<T> {
  const state: ChannelState<T> = {buffer: [], closed: false, waiters: []}

  return {
    send(value: T): boolean {
      if (state.closed) return false
      const waiter = state.waiters.shift()
      if (waiter) {
        waiter.detach()
        waiter.resolve(value)
        return true
      }
      state.buffer.push(value)
      return true
    },

    // A receive withdrawn through `signal` resolves null without taking a
    // value, so an abandoned receive never swallows a later send.
    recv(signal?: AbortSignal): Promise<T | null> {
      if (state.buffer.length > 0) return Promise.resolve(state.buffer.shift() ?? null)
      if (state.closed || signal?.aborted) return Promise.resolve(null)
      return new Promise(resolve => {
        const onAbort = () => {
          const i = state.waiters.indexOf(waiter)
          if (i >= 0) state.waiters.splice(i, 1)
          resolve(null)
        }
        const waiter: Waiter<T> = {
          resolve,
          detach: () => signal?.removeEventListener("abort", onAbort)
        }
        signal?.addEventListener("abort", onAbort, {once: true})
        state.waiters.push(waiter)
      })
    },

    close(): void {
      if (state.closed) return
      state.closed = true
      for (const waiter of state.waiters) {
        waiter.detach()
        waiter.resolve(null)
      }
      state.waiters.length = 0
    },

    isClosed(): boolean {
      return state.closed
    },

    size(): number {
      return state.buffer.length
    }
  }
}

// One-shot notification: resolves once, later calls are no-ops.
export interface Notify<T = void> {
  promise: Promise<T>
  fire(value: T): void
  fired(): boolean
}

export function createNotify<T = void>(): Notify<T> {
  let done = false
  let resolve_: (value: T) => void = () => {}
  const promise = new Promise<T>(r => { resolve_ = r })
  return {
    promise,
    fire(value: T) {
      if (done) return
      done = true
      resolve_(value)
    },
    fired: () => done
  }
}
