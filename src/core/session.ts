import { randomUUID } from 'node:crypto'

import {
  AdapterTimeoutError,
  ConflictError,
  InvalidStateError,
  InvalidTurnError,
  errorMessage,
  toRelayError,
  type RelayError
} from './errors.js'
import { withFields } from './logger.js'
import { modalitiesOf, type ModelClient } from './model-client.js'
import { buildMessages, turnText, type PromptTemplateConfig } from './prompt-template.js'
import type { RetrievalAugmenter } from './retrieval.js'
import type {
  ContentPart,
  Fragment,
  FragmentStatus,
  HistoryEntry,
  Logger,
  ModelRequest,
  RawChunk,
  Turn
} from './types.js'

export interface OrchestratorOptions {
  /** Shared clients keyed by endpoint name. */
  clients: ReadonlyMap<string, ModelClient>
  augmenter: RetrievalAugmenter
  prompts: PromptTemplateConfig
  defaultEndpoint: string
  /**
   * Longest allowed wait for the next chunk. Retrieval gets the same budget
   * but times out on its own, under the retrieval policy.
   */
  idleTimeoutMs: number
  logger: Logger
}

export interface SubmitOptions {
  /** Endpoint name; falls back to the configured default. */
  endpoint?: string
}

interface ActiveTurn {
  turn: Turn
  controller: AbortController
  cancelled: boolean
}

interface SessionState {
  id: string
  history: HistoryEntry[]
  active: ActiveTurn | null
  closed: boolean
  logger: Logger
}

const TERMINAL_EVENTS: Record<FragmentStatus, string> = {
  ok: 'turn.completed',
  error: 'turn.failed',
  cancelled: 'turn.cancelled'
}

type Waited<T> =
  | { kind: 'value'; value: T }
  | { kind: 'failed'; error: unknown }
  | { kind: 'cancelled' }
  | { kind: 'timeout' }

/**
 * One client connection's conversation. Read-only from the outside; only the
 * orchestrator that opened it changes its state.
 */
export class Session {
  constructor(private readonly state: SessionState) {}

  get id(): string {
    return this.state.id
  }

  get history(): readonly HistoryEntry[] {
    return this.state.history
  }

  get activeTurnId(): string | null {
    return this.state.active?.turn.id ?? null
  }

  get closed(): boolean {
    return this.state.closed
  }
}

/**
 * Forward-only fragment sequence for one turn. Iterating drives the turn;
 * a second iteration throws.
 */
export class TurnStream implements AsyncIterable<Fragment> {
  private started = false

  constructor(
    readonly turnId: string,
    private readonly produce: () => AsyncGenerator<Fragment>
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<Fragment> {
    if (this.started) {
      throw new InvalidStateError(`Fragments of turn ${this.turnId} were already consumed`)
    }
    this.started = true
    return this.produce()
  }
}

/** Hands out fragments with consecutive sequence numbers for one turn. */
class FragmentSequencer {
  private seq = 0

  constructor(private readonly turnId: string) {}

  get count(): number {
    return this.seq
  }

  text(payload: string): Fragment {
    return { turnId: this.turnId, seq: this.seq++, final: false, status: 'ok', payload }
  }

  complete(): Fragment {
    return { turnId: this.turnId, seq: this.seq++, final: true, status: 'ok' }
  }

  cancelled(): Fragment {
    return { turnId: this.turnId, seq: this.seq++, final: true, status: 'cancelled', payload: 'Turn cancelled' }
  }

  failed(error: RelayError): Fragment {
    return {
      turnId: this.turnId,
      seq: this.seq++,
      final: true,
      status: 'error',
      payload: error.message,
      errorCode: error.code
    }
  }
}

export class SessionOrchestrator {
  private readonly states = new WeakMap<Session, SessionState>()
  private readonly open = new Set<Session>()

  constructor(private readonly options: OrchestratorOptions) {}

  get sessionCount(): number {
    return this.open.size
  }

  openSession(): Session {
    const id = randomUUID()
    const state: SessionState = {
      id,
      history: [],
      active: null,
      closed: false,
      logger: withFields(this.options.logger, { sessionId: id })
    }
    const session = new Session(state)
    this.states.set(session, state)
    this.open.add(session)
    state.logger.info('session.opened')
    return session
  }

  /**
   * Starts a turn and returns its fragments. Rejects, never queues, a turn
   * submitted while another one is active. Nothing runs until the returned
   * stream is iterated.
   *
   * The session is free again once the terminal fragment has been produced,
   * which is a moment before the consumer receives it; a submit issued while
   * that fragment is in flight starts the next turn instead of conflicting.
   */
  submitTurn(session: Session, parts: readonly ContentPart[], options: SubmitOptions = {}): TurnStream {
    const state = this.stateOf(session)
    if (state.active) {
      throw new ConflictError(state.id, state.active.turn.id)
    }
    if (parts.length === 0) {
      throw new InvalidTurnError('A turn needs at least one content part')
    }
    const endpoint = options.endpoint ?? this.options.defaultEndpoint
    if (!this.options.clients.has(endpoint)) {
      throw new InvalidTurnError(`Unknown endpoint: ${endpoint}`)
    }

    const turn: Turn = Object.freeze({
      id: randomUUID(),
      parts: Object.freeze([...parts]),
      createdAt: new Date(),
      endpoint
    })
    const active: ActiveTurn = { turn, controller: new AbortController(), cancelled: false }
    state.active = active
    state.logger.info('turn.submitted', { turnId: turn.id, endpoint, parts: parts.length })
    return new TurnStream(turn.id, () => this.run(state, active))
  }

  /** Returns true when an active turn was asked to stop. */
  cancelTurn(session: Session): boolean {
    const state = this.stateOf(session)
    const active = state.active
    if (!active || active.cancelled) return false
    active.cancelled = true
    active.controller.abort()
    state.logger.info('turn.cancel_requested', { turnId: active.turn.id })
    return true
  }

  closeSession(session: Session): void {
    const state = this.states.get(session)
    if (!state || state.closed) return
    if (state.active && !state.active.cancelled) {
      state.active.cancelled = true
      state.active.controller.abort()
    }
    state.closed = true
    state.history.length = 0
    this.open.delete(session)
    state.logger.info('session.closed')
  }

  closeAll(): void {
    for (const session of [...this.open]) {
      this.closeSession(session)
    }
  }

  private stateOf(session: Session): SessionState {
    const state = this.states.get(session)
    if (!state) throw new InvalidStateError(`Session ${session.id} does not belong to this orchestrator`)
    if (state.closed) throw new InvalidStateError(`Session ${state.id} is closed`)
    return state
  }

  private release(state: SessionState, active: ActiveTurn): void {
    if (state.active === active) state.active = null
    active.controller.abort()
  }

  private async *run(state: SessionState, active: ActiveTurn): AsyncGenerator<Fragment> {
    const sequencer = new FragmentSequencer(active.turn.id)
    const startedAt = Date.now()
    let terminal: Fragment
    try {
      terminal = yield* this.forward(state, active, sequencer)
    } catch (error) {
      terminal = sequencer.failed(toRelayError(error))
    } finally {
      // Cleared before the terminal fragment goes out so the client may submit
      // its next turn as soon as it sees it.
      this.release(state, active)
    }

    state.logger.info(TERMINAL_EVENTS[terminal.status], {
      turnId: active.turn.id,
      fragments: sequencer.count,
      durationMs: Date.now() - startedAt,
      ...(terminal.errorCode ? { code: terminal.errorCode, error: terminal.payload } : {})
    })
    yield terminal
  }

  /** Yields the non-terminal fragments and returns the terminal one. */
  private async *forward(
    state: SessionState,
    active: ActiveTurn,
    sequencer: FragmentSequencer
  ): AsyncGenerator<Fragment, Fragment> {
    const { turn } = active
    if (active.cancelled) return sequencer.cancelled()

    const client = this.options.clients.get(turn.endpoint)
    if (!client) return sequencer.failed(new InvalidTurnError(`Unknown endpoint: ${turn.endpoint}`))

    const query = turnText(turn.parts)
    const lookup = this.options.augmenter.augment(query, {
      signal: active.controller.signal,
      timeoutMs: this.options.idleTimeoutMs
    })
    const retrieval = await this.waitFor(lookup, active, null)
    if (retrieval.kind !== 'value') return this.interrupted(retrieval, active, sequencer)

    const messages = buildMessages(this.options.prompts, state.history, turn, retrieval.value)
    const request: ModelRequest = { endpoint: client.endpoint, messages, modalities: modalitiesOf(messages) }

    let chunks: AsyncIterator<RawChunk>
    try {
      chunks = client.stream(request, active.controller.signal)[Symbol.asyncIterator]()
    } catch (error) {
      return sequencer.failed(toRelayError(error))
    }

    let buffer = ''
    let pending = false
    try {
      for (;;) {
        if (active.cancelled) return sequencer.cancelled()

        pending = true
        const next = await this.waitFor(chunks.next(), active)
        pending = false
        if (next.kind !== 'value') {
          // The adapter call is still in flight; aborting ends it.
          pending = next.kind !== 'failed'
          return this.interrupted(next, active, sequencer)
        }
        if (next.value.done) break

        const chunk = next.value.value
        if (chunk.type === 'error') return sequencer.failed(chunk.error)
        buffer += chunk.text
        yield sequencer.text(chunk.text)
      }

      if (active.cancelled) return sequencer.cancelled()
      state.history.push({ turn, response: buffer })
      return sequencer.complete()
    } finally {
      if (!pending) await this.closeChunks(chunks, state.logger)
    }
  }

  private interrupted(
    outcome: Exclude<Waited<unknown>, { kind: 'value' }>,
    active: ActiveTurn,
    sequencer: FragmentSequencer
  ): Fragment {
    switch (outcome.kind) {
      case 'cancelled':
        return sequencer.cancelled()
      case 'timeout':
        active.controller.abort()
        return sequencer.failed(new AdapterTimeoutError(this.options.idleTimeoutMs))
      case 'failed':
        return sequencer.failed(toRelayError(outcome.error))
    }
  }

  private async closeChunks(chunks: AsyncIterator<RawChunk>, logger: Logger): Promise<void> {
    try {
      await chunks.return?.()
    } catch (error) {
      logger.warn('turn.adapter_close_failed', { error: errorMessage(error) })
    }
  }

  /**
   * Waits for one suspension point of a turn. Settles early when the turn is
   * cancelled or, unless `timeoutMs` is null, when nothing arrives in time.
   */
  private waitFor<T>(
    promise: Promise<T>,
    active: ActiveTurn,
    timeoutMs: number | null = this.options.idleTimeoutMs
  ): Promise<Waited<T>> {
    const { signal } = active.controller
    return new Promise((resolve) => {
      let timer: NodeJS.Timeout | undefined
      const settle = (result: Waited<T>): void => {
        clearTimeout(timer)
        signal.removeEventListener('abort', onAbort)
        resolve(result)
      }
      const onAbort = (): void => settle({ kind: 'cancelled' })

      promise.then(
        (value) => settle({ kind: 'value', value }),
        (error: unknown) => settle({ kind: 'failed', error })
      )
      if (signal.aborted) {
        onAbort()
        return
      }
      signal.addEventListener('abort', onAbort, { once: true })
      if (timeoutMs !== null) timer = setTimeout(() => settle({ kind: 'timeout' }), timeoutMs)
    })
  }
}
