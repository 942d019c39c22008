export { createLoginRoutes, callbackURL, type LoginRoutesOptions } from './login.js';
export { createCallbackRoutes, type CallbackRoutesOptions } from './callback.js';
