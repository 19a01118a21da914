/**
 * Anything a process opens at startup and must release on shutdown:
 * bus connections, HTTP servers, store clients, dispatch loops.
 */
export interface RuntimeResource {
  start?(): Promise<void>;
  close?(): Promise<void>;
}
