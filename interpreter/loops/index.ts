export type { EventLoop } from './EventLoop';
export { AbortError } from './EventLoop';
export {
  getLoop,
  hasLoop,
  setLoop,
  clearLoop,
  keepEnvironment,
  fromThread,
  toThread,
  runOnWorker,
  nextCycle,
  makeAwaitable,
  wrapCancelled,
  translateCancelled
} from './bridge';
export { InlineEventLoop } from './InlineEventLoop';
export { NodeEventLoop } from './NodeEventLoop';
