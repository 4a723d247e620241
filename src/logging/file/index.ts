export { createFileSink, createNodeFileApi } from './file-sink';
