export * from './commands';
export * from './context';
export { createProgram } from './program';
