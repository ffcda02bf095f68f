import { UnknownMetricError } from "@/lib/errors";
import { ESG_CATEGORIES, type EsgCategory, type MetricDefinition } from "@/lib/esgPacks";

export type MetricRegistry = {
  get(metricId: string): MetricDefinition;
  has(metricId: string): boolean;
  all(): readonly MetricDefinition[];
  byCategory(category: EsgCategory): readonly MetricDefinition[];
};

export const ESG_METRICS: readonly MetricDefinition[] = [
  {
    id: "E01",
    category: "Environmental",
    nameKr: "Scope 1 온실가스 직접배출량",
    nameEn: "GHG Emissions (Scope 1)",
    unit: "tCO2eq",
    griCode: "305-1",
    validRange: { min: 0, max: 1e9 },
    polarity: "lower_better",
    keywords: ["scope 1", "scope1", "직접배출", "직접 배출", "온실가스"],
  },
  {
    id: "E02",
    category: "Environmental",
    nameKr: "Scope 2 온실가스 간접배출량",
    nameEn: "GHG Emissions (Scope 2)",
    unit: "tCO2eq",
    griCode: "305-2",
    validRange: { min: 0, max: 1e9 },
    polarity: "lower_better",
    keywords: ["scope 2", "scope2", "간접배출", "간접 배출", "온실가스"],
  },
  {
    id: "E03",
    category: "Environmental",
    nameKr: "Scope 3 기타 간접배출량",
    nameEn: "GHG Emissions (Scope 3)",
    unit: "tCO2eq",
    griCode: "305-3",
    validRange: { min: 0, max: null },
    polarity: "lower_better",
    keywords: ["scope 3", "scope3", "기타 간접", "가치사슬", "온실가스"],
  },
  {
    id: "E04",
    category: "Environmental",
    nameKr: "총 에너지 사용량",
    nameEn: "Total Energy Consumption",
    unit: "TJ",
    griCode: "302-1",
    validRange: { min: 0, max: null },
    polarity: "lower_better",
    keywords: ["에너지 사용량", "에너지 소비", "energy consumption", "tj", "mwh"],
  },
  {
    id: "E05",
    category: "Environmental",
    nameKr: "용수 취수량",
    nameEn: "Water Withdrawal",
    unit: "ton",
    equivalentUnits: ["m3"],
    griCode: "303-3",
    validRange: { min: 0, max: null },
    polarity: "lower_better",
    keywords: ["용수", "취수", "water withdrawal", "물 사용"],
  },
  {
    id: "E06",
    category: "Environmental",
    nameKr: "폐기물 발생량",
    nameEn: "Waste Generated",
    unit: "ton",
    griCode: "306-3",
    validRange: { min: 0, max: null },
    polarity: "lower_better",
    keywords: ["폐기물 발생", "폐기물 총", "waste generated"],
  },
  {
    id: "E07",
    category: "Environmental",
    nameKr: "폐기물 재활용률",
    nameEn: "Waste Recycling Rate",
    unit: "%",
    griCode: "306-4",
    validRange: { min: 0, max: 100 },
    polarity: "higher_better",
    keywords: ["재활용률", "재활용", "recycling rate"],
  },
  {
    id: "S01",
    category: "Social",
    nameKr: "총 임직원 수",
    nameEn: "Total Employees",
    unit: "count",
    griCode: "2-7",
    validRange: { min: 0, max: 1e7 },
    polarity: "neutral",
    keywords: ["임직원 수", "임직원", "직원 수", "employees", "headcount"],
  },
  {
    id: "S02",
    category: "Social",
    nameKr: "여성 임직원 비율",
    nameEn: "Female Employee Ratio",
    unit: "%",
    griCode: "405-1",
    validRange: { min: 0, max: 100 },
    polarity: "higher_better",
    keywords: ["여성 임직원", "여성 직원", "여성 비율", "female employee"],
  },
  {
    id: "S03",
    category: "Social",
    nameKr: "산업재해율",
    nameEn: "Lost Time Injury Rate",
    unit: "%",
    griCode: "403-9",
    validRange: { min: 0, max: 100 },
    polarity: "lower_better",
    keywords: ["산업재해", "재해율", "ltir", "injury rate"],
  },
  {
    id: "S04",
    category: "Social",
    nameKr: "1인당 평균 교육시간",
    nameEn: "Training Hours per Employee",
    unit: "hours",
    griCode: "404-1",
    validRange: { min: 0, max: 8760 },
    polarity: "higher_better",
    keywords: ["교육시간", "교육 시간", "training hours"],
  },
  {
    id: "S05",
    category: "Social",
    nameKr: "이직률",
    nameEn: "Employee Turnover Rate",
    unit: "%",
    griCode: "401-1",
    validRange: { min: 0, max: 100 },
    polarity: "lower_better",
    keywords: ["이직률", "퇴직률", "turnover"],
  },
  {
    id: "G01",
    category: "Governance",
    nameKr: "사외이사 비율",
    nameEn: "Independent Director Ratio",
    unit: "%",
    griCode: "2-9",
    validRange: { min: 0, max: 100 },
    polarity: "higher_better",
    keywords: ["사외이사", "독립이사", "independent director"],
  },
  {
    id: "G02",
    category: "Governance",
    nameKr: "이사회 개최 횟수",
    nameEn: "Board Meetings Held",
    unit: "count",
    griCode: "2-12",
    validRange: { min: 0, max: 100 },
    polarity: "neutral",
    keywords: ["이사회 개최", "이사회", "board meetings"],
  },
  {
    id: "G03",
    category: "Governance",
    nameKr: "여성 이사 비율",
    nameEn: "Female Board Member Ratio",
    unit: "%",
    griCode: "405-1",
    validRange: { min: 0, max: 100 },
    polarity: "higher_better",
    keywords: ["여성 이사", "여성이사", "female board", "female director"],
  },
  {
    id: "G04",
    category: "Governance",
    nameKr: "반부패 교육 이수율",
    nameEn: "Anti-corruption Training Rate",
    unit: "%",
    griCode: "205-2",
    validRange: { min: 0, max: 100 },
    polarity: "higher_better",
    keywords: ["반부패", "부패방지", "윤리 교육", "anti-corruption"],
  },
];

function compareMetrics(a: MetricDefinition, b: MetricDefinition): number {
  const ca = ESG_CATEGORIES.indexOf(a.category);
  const cb = ESG_CATEGORIES.indexOf(b.category);
  if (ca !== cb) return ca - cb;
  return a.id.localeCompare(b.id);
}

function freezeDefinition(def: MetricDefinition): MetricDefinition {
  return Object.freeze({
    ...def,
    validRange: Object.freeze({ ...def.validRange }),
    keywords: Object.freeze([...def.keywords]),
    ...(def.equivalentUnits ? { equivalentUnits: Object.freeze([...def.equivalentUnits]) } : {}),
  });
}

export function createMetricRegistry(definitions: readonly MetricDefinition[]): MetricRegistry {
  const byId = new Map<string, MetricDefinition>();
  for (const def of definitions) {
    const id = (def.id ?? "").trim();
    if (!id) throw new Error("Metric definition without id");
    if (byId.has(id)) throw new Error(`Duplicate metric id: ${id}`);
    byId.set(id, freezeDefinition({ ...def, id }));
  }

  const ordered = Object.freeze(Array.from(byId.values()).sort(compareMetrics));

  return {
    get(metricId) {
      const def = byId.get(metricId);
      if (!def) throw new UnknownMetricError(metricId);
      return def;
    },
    has(metricId) {
      return byId.has(metricId);
    },
    all() {
      return ordered;
    },
    byCategory(category) {
      return ordered.filter((m) => m.category === category);
    },
  };
}

let defaultRegistry: MetricRegistry | undefined;

export function getDefaultRegistry(): MetricRegistry {
  if (!defaultRegistry) defaultRegistry = createMetricRegistry(ESG_METRICS);
  return defaultRegistry;
}
