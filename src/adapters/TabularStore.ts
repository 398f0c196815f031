export type Cell = string | number;
export type Grid = Cell[][];

export interface TabularStore {
  /** Values as displayed in the sheet. Rows may be shorter than the range. */
  getValues(storeId: string, range: string): Promise<string[][]>;
  updateValues(storeId: string, range: string, grid: Grid): Promise<void>;
  /** Clears only the given rectangle; never pass a bare sheet name here. */
  clearRange(storeId: string, range: string): Promise<void>;
  listSheetTitles(storeId: string): Promise<string[]>;
  ensureSheetExists(storeId: string, title: string): Promise<string>;
}
