export const runtime = "nodejs";
export const dynamic = "force-dynamic";

import { NextResponse } from "next/server";
import { aiEnabled, loadConfig } from "@/lib/config";

export async function GET() {
  // DO NOT expose the key; only whether suggestions are switched on
  const { ai } = loadConfig(process.env);
  return NextResponse.json({ ai: { provider: ai.provider, model: ai.model, enabled: aiEnabled(ai) } });
}
