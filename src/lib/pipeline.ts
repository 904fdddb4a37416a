// src/lib/pipeline.ts
import type { AnalysisReport } from "./types";
import type { AppConfig } from "./config";
import { parseUpload } from "./ingest";
import { cleanDataset, engineerFeatures } from "./clean";
import { generateStandardCharts } from "./charts";
import { buildAiProfile } from "./profile";
import { buildAiCharts, fetchSuggestions, type SuggestionClient } from "./suggestions";
import { assembleReport } from "./assemble";

export type Upload = { bytes: Uint8Array; filename: string };

export type PipelineDeps = {
  config: Pick<AppConfig, "chartTopN" | "previewRows">;
  suggester: SuggestionClient | null;
};

/**
 * One upload in, one report out. Only a ParseError escapes; the suggestion
 * stage degrades to standard charts on any failure.
 */
export function createPipeline({ config, suggester }: PipelineDeps) {
  return {
    async run({ bytes, filename }: Upload): Promise<AnalysisReport> {
      const table = parseUpload(bytes, filename);
      const { dataset, report } = cleanDataset(table);
      const engineered = engineerFeatures(dataset);
      const cleaning = { ...report, engineeredColumns: engineered };

      const standard = generateStandardCharts(dataset, { topN: config.chartTopN });

      const profile = buildAiProfile(dataset, cleaning);
      const { status, suggestions } = await fetchSuggestions(suggester, profile, dataset);
      const ai = buildAiCharts(suggestions, dataset);

      return assembleReport({
        dataset,
        report: cleaning,
        standard,
        ai,
        aiStatus: status,
        previewRows: config.previewRows,
      });
    },
  };
}

export type Pipeline = ReturnType<typeof createPipeline>;
