export { handlePointer } from './handlePointer';
