export * from './types/index.js';
export * from './errors.js';
export * from './config.js';
export * from './queue/lane-queue.js';
export * from './ports/storage.port.js';
export * from './ports/database.port.js';
export * from './ports/transcription.port.js';
export * from './ports/vision.port.js';
export * from './ports/memory.port.js';
export * from './ports/video-encoder.port.js';
export * from './ports/wire.port.js';
