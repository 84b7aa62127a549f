export { createOAuth2Error, mapOAuth2ErrorCode } from './create-oauth2-error.js';
export { extractOAuth2Error, fallbackErrorResponse } from './parse-error-response.js';
