export { CORRELATION_ID_HEADER, correlationIdHook, resolveCorrelationId } from './correlation-id.hook';
