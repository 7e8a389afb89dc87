export const SOURCE_TYPES = ["Payable", "Receivable", "Invoice", "Proforma"] as const;

export type SourceType = (typeof SOURCE_TYPES)[number];
export type SourceScope = SourceType | "all";

export type CanonicalRecord = Readonly<{
  // ISO YYYY-MM-DD, Gregorian.
  eventDate: string;
  jalaliDate: string;
  // Display unit (Toman). Sign is fixed by sourceType.
  amount: number;
  counterparty?: string;
  sourceType: SourceType;
  rowIndex: number;
  reference?: string;
  netAmount?: number;
  tax?: number;
}>;

export type NormalizationWarningCode =
  | "DATE_MISSING"
  | "DATE_INVALID"
  | "AMOUNT_MISSING"
  | "AMOUNT_INVALID";

export type NormalizationWarning = {
  sourceType: SourceType;
  rowIndex: number;
  code: NormalizationWarningCode;
  message: string;
  // Set when the row was dropped rather than kept with a substitute value.
  dropped: boolean;
};

export type DatasetSnapshot = Readonly<{
  sourceType: SourceType;
  records: readonly CanonicalRecord[];
  // Content hash of the raw rows; the source identity part of a fingerprint.
  version: string;
  loadedAt: string;
  warnings: readonly NormalizationWarning[];
}>;

export type Datasets = Partial<Record<SourceType, DatasetSnapshot>>;

export const AGING_BUCKETS = ["current", "1-30", "31-60", "61-90", "90+"] as const;
export type AgingBucket = (typeof AGING_BUCKETS)[number];

export const ANALYSIS_KINDS = [
  "daily_breakdown",
  "cumulative",
  "top_counterparties",
  "summary_stats",
  "cash_flow",
  "accounts_aging",
  "profitability",
  "forecast",
  "customer_loyalty",
  "proforma_conversion",
  "management_report",
  "integrated_trend",
] as const;

export type AnalysisKind = (typeof ANALYSIS_KINDS)[number];

export type AnalysisRequest =
  | { kind: "daily_breakdown"; sourceType: SourceScope }
  | { kind: "cumulative"; sourceType: SourceScope }
  | { kind: "top_counterparties"; sourceType: SourceScope; topN?: number }
  | { kind: "summary_stats"; sourceType: SourceScope }
  | { kind: "customer_loyalty"; sourceType: SourceScope }
  | { kind: "cash_flow"; referenceDate?: string }
  | { kind: "accounts_aging"; referenceDate?: string }
  | { kind: "profitability" }
  | {
      kind: "forecast";
      forecastDays?: number;
      referenceDate?: string;
      startingPosition?: number;
    }
  | { kind: "proforma_conversion"; onTimeDays?: number }
  | { kind: "management_report" }
  | { kind: "integrated_trend" };

export type DailyRow = {
  date: string;
  jalaliDate: string;
  sum: number;
  count: number;
  mean: number;
};

export type DailyBreakdownPayload = {
  days: DailyRow[];
};

export type CumulativePayload = {
  points: Array<{ date: string; jalaliDate: string; sum: number; cumulative: number }>;
  totalSum: number;
  totalMean: number;
};

export type CounterpartyTotal = {
  counterparty: string;
  sum: number;
  count: number;
  mean: number;
};

export type TopCounterpartiesPayload = {
  topN: number;
  counterparties: CounterpartyTotal[];
};

export type SummaryStatsPayload = {
  rowCount: number;
  nullCounts: {
    counterparty: number;
    reference: number;
    netAmount: number;
    tax: number;
  };
  amount: {
    sum: number;
    mean: number | null;
    std: number | null;
    min: number | null;
    max: number | null;
  };
  dateRange: { first: string | null; last: string | null };
};

export type CashFlowPayload = {
  referenceDate: string;
  referenceJalaliDate: string;
  totalIncome: number;
  totalOutcome: number;
  netCashFlow: number;
  currentPosition: number;
  dailyFlow: Array<{
    date: string;
    jalaliDate: string;
    income: number;
    outcome: number;
    net: number;
    cumulative: number;
  }>;
  typeSummary: Array<{ sourceType: SourceType; count: number; sum: number }>;
};

export type AgingSide = {
  total: number;
  totalOverdue: number;
  notYetDue: number;
  count: number;
  buckets: Record<AgingBucket, number>;
};

export type AccountsAgingPayload = {
  referenceDate: string;
  referenceJalaliDate: string;
  payables: AgingSide;
  receivables: AgingSide;
  netPosition: number;
};

export type ProfitabilityPayload = {
  totalRevenue: number;
  netRevenue: number;
  totalTax: number;
  totalCosts: number;
  grossProfit: number;
  netProfit: number;
  grossMargin: number;
  netMargin: number;
  topCustomers: CounterpartyTotal[];
  monthlyRevenue: Array<{ month: string; revenue: number; invoiceCount: number }>;
};

export type ForecastDay = {
  date: string;
  jalaliDate: string;
  inflow: number;
  outflow: number;
  net: number;
  position: number;
};

export type ForecastPayload = {
  forecastDays: number;
  referenceDate: string;
  horizonDate: string;
  startingPosition: number;
  totalIncoming: number;
  totalOutgoing: number;
  netForecast: number;
  minPosition: number;
  minPositionDate: string;
  maxPosition: number;
  maxPositionDate: string;
  daily: ForecastDay[];
  weekly: Array<{
    week: number;
    start: string;
    end: string;
    inflow: number;
    outflow: number;
    net: number;
    endPosition: number;
  }>;
};

export type CustomerLoyaltyPayload = {
  totalCustomers: number;
  customers: Array<{
    counterparty: string;
    totalValue: number;
    orderCount: number;
    averageValue: number;
    lastActivity: string;
  }>;
};

export type ProformaConversionPayload = {
  onTimeDays: number;
  totalProforma: number;
  totalConverted: number;
  totalOnTime: number;
  conversionRate: number;
  onTimeRate: number;
  averageGapDays: number | null;
  details: Array<{
    reference: string | null;
    counterparty: string | null;
    proformaDate: string;
    invoiceDate: string | null;
    gapDays: number | null;
    converted: boolean;
    onTime: boolean;
  }>;
};

export type ManagementReportPayload = {
  totalSales: number;
  totalPayable: number;
  totalReceivable: number;
  proformaCount: number;
  invoiceCount: number;
  conversionRate: number;
  netPosition: number;
};

export type IntegratedTrendPayload = {
  months: Array<{
    month: string;
    invoices: number;
    proforma: number;
    payable: number;
    receivable: number;
    netCashFlow: number;
    cumulativeCash: number;
  }>;
};

export type AnalysisPayloadMap = {
  daily_breakdown: DailyBreakdownPayload;
  cumulative: CumulativePayload;
  top_counterparties: TopCounterpartiesPayload;
  summary_stats: SummaryStatsPayload;
  cash_flow: CashFlowPayload;
  accounts_aging: AccountsAgingPayload;
  profitability: ProfitabilityPayload;
  forecast: ForecastPayload;
  customer_loyalty: CustomerLoyaltyPayload;
  proforma_conversion: ProformaConversionPayload;
  management_report: ManagementReportPayload;
  integrated_trend: IntegratedTrendPayload;
};

export type ComputedAnalysis = {
  [K in AnalysisKind]: { kind: K; payload: AnalysisPayloadMap[K] };
}[AnalysisKind];

export type AnalysisResult = ComputedAnalysis & {
  sourceType: SourceScope;
  computedAt: string;
  fingerprint: string;
  recordCount: number;
};
