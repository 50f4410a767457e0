// Cabeçalhos aceitos por campo. As planilhas de agenda usam nomes em
// japonês ou em inglês; o primeiro alias com valor preenchido vence.

export const COLUMNS = {
  instrument: ['通貨ペア', 'currency_pair', 'instrument'],
  side: ['方向', 'direction', '売買', 'side'],
  quantity: ['数量', 'quantity'],
  entryTime: ['エントリー時刻', 'entry_time', 'エントリー時間'],
  exitTime: ['クローズ時刻', 'exit_time', '決済時間'],
  date: ['日付', 'date'],
  holding: ['保有時間', 'holding_seconds', 'holding_duration'],
  executed: ['実行済み', 'executed'],
  closed: ['決済済み', 'closed']
} as const;

export type ColumnField = keyof typeof COLUMNS;

export const REQUIRED_FIELDS: readonly ColumnField[] = ['instrument', 'entryTime'];

const BUY_WORDS = ['買い', 'buy', 'long', 'l', 'ロング'];
const SELL_WORDS = ['売り', 'sell', 'short', 's', 'ショート'];
const TRUE_WORDS = ['yes', 'true', '1', 'y', '済'];

export function normalizeSide(value: string): 'BUY' | 'SELL' | null {
  const side = value.trim().toLowerCase();
  if (side === '' || BUY_WORDS.includes(side)) return 'BUY';
  if (SELL_WORDS.includes(side)) return 'SELL';
  return null;
}

export function isTruthyFlag(value: unknown): boolean {
  if (value === true) return true;
  if (value === null || value === undefined) return false;
  return TRUE_WORDS.includes(String(value).trim().toLowerCase());
}
