export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './io/reader.js';
export * from './io/writer.js';
export * from './io/crc32.js';
export * from './sav/compression.js';
export * from './sav/container.js';
export * from './properties/model.js';
export * from './properties/names.js';
export * from './properties/context.js';
export * from './properties/registry.js';
export * from './properties/structs.js';
export * from './properties/parser.js';
export * from './properties/serializer.js';
export * from './archive/model.js';
export * from './archive/parser.js';
export * from './archive/serializer.js';
export * from './archive/content.js';
export * from './archive/persistence.js';
export * from './codec.js';
export * from './json/bridge.js';
