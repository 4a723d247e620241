export { collectFrames, openFrameFile, readFrames, writeFrameFile } from './reader';
