import { NextResponse } from "next/server";
import { getMissingRequiredEnv } from "@/lib/env";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

export async function GET() {
  const missing = getMissingRequiredEnv();
  if (missing.length > 0) {
    return NextResponse.json({ ok: false, missing }, { status: 503 });
  }
  return NextResponse.json({ ok: true }, { status: 200 });
}
