export { withTimeout, sleep } from './timeout';
export { retry, backoffDelay, type RetryOptions } from './retry';
export { SerialQueue } from './serial-queue';
