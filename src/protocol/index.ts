/**
 * Protocol layer exports.
 */

export * from './constants';
export * from './crc';
export * from './frame';
export * from './reassembler';
export * from './commands';
export * from './responses';
