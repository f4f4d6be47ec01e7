export * from './http/createExpressApp.js';
export * from './middleware/registryErrors.js';
export * from './middleware/responseEnvelope.js';
export * from './middleware/services.js';
