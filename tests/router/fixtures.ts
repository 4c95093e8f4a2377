import type { ScoringVocabulary } from "../../src/router/keywordScorer.js";
import type { PatternDefinition } from "../../src/router/patternLibrary.js";
import type { RoutingData } from "../../src/router/queryRouter.js";
import type { SynonymGroup } from "../../src/router/synonymTable.js";
import type { ToolCatalogEntry } from "../../src/router/toolCatalog.js";

/** 22 January 2026, a Thursday. */
export const TODAY = new Date(2026, 0, 22);

export const FIXTURE_SYNONYMS: readonly SynonymGroup[] = [
  { canonical: "invoice", forms: ["Faktur", "invoices", "tagihan"], tools: ["invoice_list_sales", "invoice_get_detail"] },
  { canonical: "customer", forms: ["customers", "pelanggan", "client"], tools: ["contact_list", "contact_get_detail"] },
  {
    canonical: "outstanding",
    forms: ["overdue", "jatuh tempo", "belum lunas"],
    tools: ["invoice_list_sales", "outstanding_by_customer"],
  },
  { canonical: "salesperson", forms: ["sales rep", "per orang"], tools: ["financial_sales_by_person"] },
  { canonical: "receivable", forms: ["piutang", "receivables"], tools: ["outstanding_by_customer", "ghost_tool"] },
];

export const FIXTURE_VOCABULARY: ScoringVocabulary = {
  stopwords: ["show", "me", "the", "all", "and", "of", "for", "by", "from", "yang", "saya", "get", "tampilkan"],
  actionVerbs: {
    list: ["_list"],
    show: ["_list"],
    daftar: ["_list"],
    detail: ["_detail", "_get"],
    get: ["_detail", "_get"],
    rincian: ["_detail", "_get"],
  },
};

export const FIXTURE_CATALOG: readonly ToolCatalogEntry[] = [
  {
    name: "invoice_list_sales",
    purpose: "List sales invoices",
    params: ["search", "status_id", "date_from", "date_to"],
    hints: "sales invoices, unpaid bills",
  },
  { name: "invoice_get_detail", purpose: "Get invoice details", params: ["invoice_id"], hints: "invoice line items" },
  { name: "contact_list", purpose: "List customers and vendors", params: ["search"], hints: "customers, suppliers" },
  {
    name: "contact_get_detail",
    purpose: "Get contact details",
    params: ["contact_id"],
    hints: "customer address, phone",
  },
  {
    name: "outstanding_by_customer",
    purpose: "Outstanding receivables grouped by customer",
    params: ["date_from", "date_to"],
    hints: "unpaid customer balances",
  },
  {
    name: "financial_sales_by_person",
    purpose: "Sales grouped by sales person",
    params: ["date_from", "date_to"],
    hints: "salesperson ranking, commission",
  },
];

export const FIXTURE_PATTERNS: readonly PatternDefinition[] = [
  {
    phrases: ["siapa yang hutang", "who owes me"],
    tool: "outstanding_by_customer",
    alternative: "invoice_list_sales",
    confidence: "definitive",
  },
  {
    phrases: ["siapa yang hutang ke kita"],
    tool: "invoice_list_sales",
    params: { status_id: 2 },
    confidence: "context-dependent",
  },
  {
    phrases: ["sales per person", "top sales"],
    tool: "financial_sales_by_person",
    dateHint: "this_month",
    confidence: "definitive",
  },
];

export const FIXTURE_DATA: RoutingData = {
  synonyms: FIXTURE_SYNONYMS,
  patterns: FIXTURE_PATTERNS,
  vocabulary: FIXTURE_VOCABULARY,
  catalog: FIXTURE_CATALOG,
};
