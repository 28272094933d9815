// Clock port - current date and time as the note tree spells them

export type DateTimeParts = {
  readonly date: string; // YYYYMMDD
  readonly time: string; // HHmmSS
  readonly stamp: string; // YYYY-MM-DD HH:MM, used in ledger comments
};

export interface Clock {
  now(): DateTimeParts;
}
