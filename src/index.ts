/** Library entry point. */
export * from './runner/debug/service';
export * from './runner/errors';
export * from './runner/exec/run-script';
export * from './runner/exec/traceback';
export * from './runner/explain/classify';
export * from './runner/explain/report';
export { makeCli } from './cli';
export type { DebuggerConfig } from './cli/config/schema';
