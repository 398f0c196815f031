import type { HeaderField } from "./types.js";

// Header synonyms, matched as lower-case substrings.
export const HEADER_KEYWORDS: Record<HeaderField, readonly string[]> = {
  manager: ["менеджер", "сотрудник", "manager", "employee"],
  legalForm: ["опф", "форма", "legal form"],
  contract: ["договор", "контракт", "contract"],
  acceptance: ["акцепт", "платежки", "оплата", "поехали", "accept", "payment"],
  tag: ["метки", "наличие метки", "nib", "tag"]
};

export const MANAGER_HEADER_LABEL = "менеджер";

// Organisation-form markers found anywhere in the row text.
export const IP_MARKERS = ["ип ", "ип\"", "жк "];
export const TOO_MARKER = "тоо";

export const CONTRACT_NEGATIVES = new Set(["", "нет", "0", "-", "—"]);
export const ACCEPT_NEGATIVES = ["нет", "отказ", "ошибка"];

export const RED_MARKER = "красн";

export const DIAGNOSTICS = {
  noSheetName: "Нет листа (пусто в Settings)",
  sheetNotFound: (name: string) => `❌ Лист "${name}" не найден`,
  sheetEmpty: "Лист пуст",
  managerColumnMissing: "Не найдена колонка \"Менеджер\"",
  noData: "Нет данных"
};
