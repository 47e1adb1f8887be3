/**
 * FeathersJS Runtime Re-exports
 *
 * Core re-exports the FeathersJS runtime so the daemon imports it through
 * @triage/core/feathers and a single package pins the versions.
 */

// Errors
export { BadRequest, GeneralError, NotFound, Unavailable } from '@feathersjs/errors';
export type { Application as ExpressApplication } from '@feathersjs/express';
// Express Integration
export {
  default as feathersExpress,
  errorHandler,
  json,
  notFound,
  rest,
  urlencoded,
} from '@feathersjs/express';
export type { Application, Id, Params, ServiceMethods } from '@feathersjs/feathers';
// Core Feathers
export { feathers } from '@feathersjs/feathers';
// Socket.io Integration
export { default as socketio } from '@feathersjs/socketio';
