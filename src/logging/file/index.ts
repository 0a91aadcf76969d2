export { createFileSink } from './file-sink';
