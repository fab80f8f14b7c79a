/** Account information for the token's owner. */
import { accountSchema, decodeEnvelope, parseRecord, type Account } from '@exakit/shared';
import type { HttpTransport } from '../lib/http-transport.js';

export async function getAccount(transport: HttpTransport): Promise<Account> {
  const data = decodeEnvelope(await transport.get('account'), 'object');
  return parseRecord(accountSchema, data, 'Account');
}
