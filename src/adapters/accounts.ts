import type { JsonObject } from '../gateway/json';
import type { AdapterContext } from './context';
import { asArray, isJsonObject, parseBoolean, parseString, pick } from './parse';

export interface Account {
  id: string;
  type: string;
  desc: string;
  covestor: boolean;
}

export function toAccount(row: JsonObject): Account {
  return {
    id: parseString(pick(row, 'id', 'accountId')) ?? '',
    type: parseString(pick(row, 'type', 'accountVan')) ?? '',
    desc: parseString(row.desc) ?? '',
    covestor: parseBoolean(row.covestor) ?? false,
  };
}

export class AccountsAdapter {
  constructor(private readonly ctx: AdapterContext) {}

  async getAccounts(): Promise<Account[]> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get('/portfolio/accounts');
    const accounts: Account[] = [];
    for (const item of asArray(data)) {
      if (isJsonObject(item)) {
        accounts.push(toAccount(item));
      } else if (typeof item === 'string' || typeof item === 'number') {
        // some gateway versions list bare account ids
        accounts.push({ id: String(item), type: 'UNKNOWN', desc: '', covestor: false });
      }
    }
    this.ctx.logger.info({ count: accounts.length }, 'accounts loaded');
    return accounts;
  }

  async getAccountSummary(accountId: string): Promise<JsonObject> {
    await this.ctx.session.ensureLive();
    const data = await this.ctx.transport.get(`/portfolio/${encodeURIComponent(accountId)}/summary`);
    return isJsonObject(data) ? data : {};
  }
}
