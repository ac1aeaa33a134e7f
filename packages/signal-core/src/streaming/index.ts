// Streaming primitives
export { RingBuffer } from './ring-buffer.js';
export { Channel } from './channel.js';
