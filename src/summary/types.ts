export type ReportRow = [
  manager: string,
  total: number,
  ip: number,
  too: number,
  contract: number,
  accept: number,
  acceptRatio: number,
  nibSale: number,
  nib: number,
  zero: number,
  emptyTag: number,
  otherTag: number,
  red: number
];

export const REPORT_WIDTH = 13;

export type SheetAnalysis =
  | { kind: "rows"; rows: ReportRow[] }
  | { kind: "diagnostic"; message: string };

export type ManagerStats = {
  total: number;
  ip: number;
  too: number;
  contract: number;
  accept: number;
  nibSale: number;
  nib: number;
  zero: number;
  emptyTag: number;
  otherTag: number;
  red: number;
};

export type HeaderField = "manager" | "legalForm" | "contract" | "acceptance" | "tag";

export type HeaderIndex = Record<HeaderField, number>;
