import missingValueExpressions from './missing-value-expressions.json';
import sheetKeywords from './sheet-keywords.json';

export interface CompanionSheetKeywords {
  label: string;
  name: readonly string[];
  content: readonly string[];
}

export type CompanionSheetKind = 'codebook' | 'questionMaster' | 'metadata';

/** Lower-cased spellings that stand for "no value" */
export const MISSING_VALUE_EXPRESSIONS: ReadonlySet<string> = new Set(
  missingValueExpressions.map((expr) => expr.toLowerCase()),
);

export const COMPANION_SHEET_KEYWORDS: Readonly<Record<CompanionSheetKind, CompanionSheetKeywords>> =
  sheetKeywords;

/** Labels such as "その他:" or "Other (please specify)" that introduce free text */
export const FREE_TEXT_PATTERN =
  /^\s*(?:(?:その他|そのほか)\s*[:：\-/]|(?:その他|そのほか)\s*[(（].*[)）]|(?:コメント|自由記述|詳細|備考|補足|感想|意見|メモ|特記事項|注釈|自己PR|フリーテキスト|フリー回答)\s*[:：]|(?:others?|comments?|notes?|remarks?)\s*[:(])/i;

/** Characters that render differently across platforms and encodings */
export const PLATFORM_DEPENDENT_PATTERN = /[①-⑳⓪-⓿Ⅰ-Ⅻⅰ-ⅻ㊤㊥㊦㊧㊨㈱㈲㈹℡〒〓※]/;
