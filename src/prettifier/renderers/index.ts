export { DiffRenderer } from './diff'
export { JsonRenderer } from './json'
