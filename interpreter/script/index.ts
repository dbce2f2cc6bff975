export { Script, clearModule } from './Script';
export type { ScriptExecutor, ScriptInit, ScriptState, ScriptTarget } from './Script';
export { loadCode, loadScript } from './load';
export type { LoadOptions, LoadTarget } from './load';
export { chdirRunner, inlineRunner, workerRunner } from './runners';
export type { Runner } from './runners';
