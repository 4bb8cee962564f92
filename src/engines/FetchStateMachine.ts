/**
 * Máquina de estados explícita de una llamada a Fetcher.fetch.
 *
 * Cada llamada crea su propia instancia: el estado nunca se comparte entre descargas.
 * Las transiciones no listadas en TRANSITIONS lanzan error; FAILED es alcanzable
 * desde cualquier estado no terminal.
 *
 * @module FetchStateMachine
 */

export const FETCH_STATE = {
  PREFLIGHT: 'preflight',
  CACHE_HIT: 'cache_hit',
  PLANNING: 'planning',
  DOWNLOADING: 'downloading',
  ASSEMBLING: 'assembling',
  VERIFYING: 'verifying',
  DONE: 'done',
  FAILED: 'failed',
} as const;

export type FetchStateKey = keyof typeof FETCH_STATE;
export type FetchStateValue = (typeof FETCH_STATE)[FetchStateKey];

/**
 * Transiciones permitidas: desde cada estado, lista de estados destino válidos.
 */
const TRANSITIONS: Record<FetchStateValue, readonly FetchStateValue[]> = {
  [FETCH_STATE.PREFLIGHT]: [FETCH_STATE.CACHE_HIT, FETCH_STATE.PLANNING, FETCH_STATE.FAILED],
  [FETCH_STATE.CACHE_HIT]: [FETCH_STATE.DONE, FETCH_STATE.FAILED],
  [FETCH_STATE.PLANNING]: [FETCH_STATE.DOWNLOADING, FETCH_STATE.FAILED],
  [FETCH_STATE.DOWNLOADING]: [FETCH_STATE.ASSEMBLING, FETCH_STATE.FAILED],
  [FETCH_STATE.ASSEMBLING]: [FETCH_STATE.VERIFYING, FETCH_STATE.DONE, FETCH_STATE.FAILED],
  [FETCH_STATE.VERIFYING]: [FETCH_STATE.DONE, FETCH_STATE.FAILED],
  [FETCH_STATE.DONE]: [],
  [FETCH_STATE.FAILED]: [],
};

export function canTransition(from: FetchStateValue, to: FetchStateValue): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminalState(state: FetchStateValue): boolean {
  return state === FETCH_STATE.DONE || state === FETCH_STATE.FAILED;
}

export type StateChangeListener = (_from: FetchStateValue, _to: FetchStateValue) => void;

export class FetchStateMachine {
  private current: FetchStateValue = FETCH_STATE.PREFLIGHT;
  private readonly history: FetchStateValue[] = [FETCH_STATE.PREFLIGHT];

  constructor(private readonly listener: StateChangeListener | null = null) {}

  get state(): FetchStateValue {
    return this.current;
  }

  /** Estados recorridos en orden, empezando por PREFLIGHT. */
  get path(): readonly FetchStateValue[] {
    return this.history;
  }

  transition(to: FetchStateValue): void {
    if (!canTransition(this.current, to)) {
      throw new Error(`Transición inválida: ${this.current} → ${to}`);
    }
    const from = this.current;
    this.current = to;
    this.history.push(to);
    this.listener?.(from, to);
  }

  /** Pasa a FAILED salvo que ya esté en un estado terminal. Devuelve el estado en el que falló. */
  fail(): FetchStateValue {
    const failedAt = this.current;
    if (!isTerminalState(this.current)) {
      this.transition(FETCH_STATE.FAILED);
    }
    return failedAt;
  }
}
