export type RawRecord = Readonly<{
  merchant_name_raw: string;
  address?: string;
  city?: string;
  country?: string;
  state?: string;
  // Unmapped columns, in header order, copied verbatim from the input row.
  passthrough: ReadonlyArray<readonly [string, string]>;
}>;

export type ResolvedRecord = Readonly<{
  cleaned_name: string;
  website: string;
  socials: readonly string[];
  evidence: string;
  evidence_links: readonly string[];
  accumulated_cost: number;
  remarks: string;
  logo_filename: string;
}>;

export type ResolvedField = keyof ResolvedRecord;

export const REMARK_WEBSITE_UNAVAILABLE = "website unavailable";
export const REMARK_NOT_FOUND = "NA";
export const REMARK_FATAL_PREFIX = "FATAL_ERROR";

export type ColumnMapping = {
  merchant_name: string;
  address?: string;
  city?: string;
  country?: string;
  state?: string;
};

export type OutputColumn = {
  source_field: ResolvedField;
  output_header: string;
  enabled: boolean;
};

export type ProcessingMode = "Basic" | "Enhanced";

export type SocialPlatform = "facebook" | "linkedin" | "instagram" | "twitter";

export type JobSettings = {
  input_path: string;
  output_path: string;
  column_mapping: ColumnMapping;
  // 1-based sheet rows, inclusive; row 1 is the header so row 2 is the first data row.
  start_row: number;
  end_row: number;
  mode: ProcessingMode;
  model_name: string;
  budget_per_row: number;
  output_columns: OutputColumn[];
  social_priority: SocialPlatform[];
  checkpoint_every: number;
};

export const DEFAULT_SOCIAL_PRIORITY: SocialPlatform[] = ["facebook", "linkedin", "instagram", "twitter"];

export function defaultOutputColumns(): OutputColumn[] {
  const fields: Array<[ResolvedField, string]> = [
    ["cleaned_name", "Cleaned Merchant Name"],
    ["website", "Website"],
    ["socials", "Social(s)"],
    ["evidence", "Evidence"],
    ["evidence_links", "Evidence Links"],
    ["accumulated_cost", "Cost per Row"],
    ["logo_filename", "Logo Filename"],
    ["remarks", "Remarks"]
  ];
  return fields.map(([source_field, output_header]) => ({ source_field, output_header, enabled: true }));
}

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type SettingsSnapshot = DeepReadonly<JobSettings>;

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const v of Object.values(value)) deepFreeze(v);
    Object.freeze(value);
  }
  return value;
}

// Independent, frozen copy handed to the worker; later edits by the caller cannot reach it.
export function snapshotSettings(settings: JobSettings | SettingsSnapshot): SettingsSnapshot {
  return deepFreeze(structuredClone(settings));
}
