export enum State {
  READY = 'READY',
  AWAITING_MODEL = 'AWAITING_MODEL',
  DISPATCHING = 'DISPATCHING',
  AWAITING_USER = 'AWAITING_USER',
  ENDED = 'ENDED'
}

export class FSM {
  state: State = State.READY;
}
