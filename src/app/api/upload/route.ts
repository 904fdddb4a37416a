// src/app/api/upload/route.ts
export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextResponse } from "next/server";
import { loadConfig } from "@/lib/config";
import { ParseError } from "@/lib/errors";
import { createPipeline } from "@/lib/pipeline";
import { createSuggestionClient } from "@/lib/suggestions";

function ok<T>(data: T, status = 200) { return NextResponse.json(data, { status }); }
function err(message: string, status = 400) { return NextResponse.json({ error: message }, { status }); }

export async function POST(req: Request) {
  const config = loadConfig(process.env);

  let form: FormData;
  try {
    form = await req.formData();
  } catch {
    return err("Expected a multipart form upload.");
  }

  const file = form.get("file");
  if (file === null) return err("No file part");
  if (typeof file === "string") return err("The 'file' field must be a file.");
  if (!file.name) return err("No selected file");
  if (file.size > config.maxUploadBytes) {
    return err(`File exceeds the ${Math.round(config.maxUploadBytes / 1024 / 1024)}MB limit.`, 413);
  }

  const pipeline = createPipeline({ config, suggester: createSuggestionClient(config.ai) });

  try {
    const bytes = new Uint8Array(await file.arrayBuffer());
    const report = await pipeline.run({ bytes, filename: file.name });
    console.info("[upload] analysed", {
      file: file.name,
      rows: report.rows,
      cleanScore: report.clean_score,
      ai: report.ai.status,
    });
    return ok(report);
  } catch (e) {
    if (e instanceof ParseError) return err(e.message, 400);
    console.error("[upload] Unexpected error", e);
    return err("Analysis failed.", 500);
  }
}
