export { SerialExecutor } from './serial-executor';
