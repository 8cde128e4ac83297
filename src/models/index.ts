/**
 * Models layer exports.
 */

export * from './enums';
export * from './device-spec';
export * from './firmware';
export * from './status';
