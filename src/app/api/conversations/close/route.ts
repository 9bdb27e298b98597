import { NextResponse } from "next/server";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { getAssistant } from "@/server/assistant";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const BodySchema = z.object({
  sessionId: z.string().min(1),
});

export async function POST(request: Request) {
  const parsed = BodySchema.safeParse(await request.json().catch(() => null));
  if (!parsed.success) {
    return NextResponse.json({ ok: false, error: parsed.error.flatten() }, { status: 400 });
  }

  try {
    const assistant = await getAssistant();
    const closed = await assistant.closeSession(parsed.data.sessionId);
    return NextResponse.json({ ok: true, closed }, { status: 200 });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return NextResponse.json({ ok: false, error: err.message }, { status: 503 });
    }
    logger.error(`Closing session failed: ${errorMessage(err)}`);
    return NextResponse.json({ ok: false, error: "Internal error" }, { status: 500 });
  }
}
