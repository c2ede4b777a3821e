import type { Logger } from '../logger';
import type { Session } from '../gateway/session';
import type { Transport } from '../gateway/transport';

/** What every adapter holds: the one shared session and the transport it was built on. */
export interface AdapterContext {
  session: Session;
  transport: Transport;
  logger: Logger;
}
