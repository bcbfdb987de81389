import createDebug from 'debug';

// All pipeline tracing lives under one namespace: DEBUG=vertical:* to see it.
const BASE_NAMESPACE = 'vertical';

export const makeDebug = (scope: string) => createDebug(`${BASE_NAMESPACE}:${scope}`);

export default makeDebug;
