// Chart/news modal as explicit UI states driven by one reducer.

export type ModalState<T> =
  | { kind: 'closed' }
  | { kind: 'loading'; title: string; token: number }
  | { kind: 'showing'; title: string; token: number; data: T }
  | { kind: 'error'; title: string; token: number; message: string };

export type ModalAction<T> =
  | { type: 'open'; title: string; token: number }
  | { type: 'loaded'; token: number; data: T }
  | { type: 'failed'; token: number; message: string }
  | { type: 'close' };

export function modalReducer<T>(state: ModalState<T>, action: ModalAction<T>): ModalState<T> {
  switch (action.type) {
    case 'open':
      return { kind: 'loading', title: action.title, token: action.token };
    case 'close':
      return { kind: 'closed' };
    case 'loaded':
      if (state.kind !== 'loading' || state.token !== action.token) return state;
      return { kind: 'showing', title: state.title, token: state.token, data: action.data };
    case 'failed':
      if (state.kind !== 'loading' || state.token !== action.token) return state;
      return { kind: 'error', title: state.title, token: state.token, message: action.message };
  }
}

export class ModalStore<T> {
  private state: ModalState<T> = { kind: 'closed' };
  private nextToken = 1;
  private listeners = new Set<(s: ModalState<T>) => void>();

  get current(): ModalState<T> {
    return this.state;
  }

  /** Starts a request and returns its token. */
  open(title: string): number {
    const token = this.nextToken++;
    this.dispatch({ type: 'open', title, token });
    return token;
  }

  resolve(token: number, data: T) {
    this.dispatch({ type: 'loaded', token, data });
  }

  reject(token: number, message: string) {
    this.dispatch({ type: 'failed', token, message });
  }

  close() {
    this.dispatch({ type: 'close' });
  }

  subscribe(listener: (s: ModalState<T>) => void): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  private dispatch(action: ModalAction<T>) {
    const next = modalReducer(this.state, action);
    if (next === this.state) return;
    this.state = next;
    this.listeners.forEach(l => l(next));
  }
}
