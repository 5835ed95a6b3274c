import { BehaviorSubject, type Observable } from 'rxjs';

import type { ViewState, ViewTransition } from './viewState.js';

function freezeState(state: ViewState): ViewState {
  return Object.freeze({
    ...state,
    bodies: Object.freeze(state.bodies.map((body) => Object.freeze({ ...body })))
  });
}

/**
 * Single owner of the mutable view state. Writers (input handling, the
 * ephemeris refresher) submit transitions; readers only ever get frozen
 * snapshots, so a frame can never observe a half-applied update.
 */
export class ViewStateStore {
  private readonly subject: BehaviorSubject<ViewState>;
  readonly state$: Observable<ViewState>;

  constructor(initial: ViewState) {
    this.subject = new BehaviorSubject<ViewState>(freezeState(initial));
    this.state$ = this.subject.asObservable();
  }

  snapshot(): ViewState {
    return this.subject.value;
  }

  update(transition: ViewTransition): ViewState {
    const next = freezeState(transition(this.subject.value));
    this.subject.next(next);
    return next;
  }

  complete(): void {
    this.subject.complete();
  }
}
