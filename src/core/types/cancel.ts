/** Desregistra una operación suspendida (waiter, timer, etc). Debe ser idempotente. */
export type Canceler = () => void;
