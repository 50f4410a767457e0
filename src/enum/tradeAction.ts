export enum TradeAction {
  ENTRY = 'ENTRY',
  EXIT = 'EXIT'
}
