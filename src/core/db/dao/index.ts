export { RunDao } from './RunDao'
export { RunStepDao } from './RunStepDao'
