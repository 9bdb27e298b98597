import { NextResponse } from "next/server";
import { z } from "zod";
import { ConfigurationError, errorMessage } from "@/lib/errors";
import { logger } from "@/lib/logger";
import { getAssistant } from "@/server/assistant";

export const runtime = "nodejs";
export const dynamic = "force-dynamic";

const SessionIdSchema = z.string().regex(/^[a-zA-Z0-9._-]{1,64}$/);

const PostBodySchema = z.object({
  sessionId: SessionIdSchema.optional(),
  message: z.string().trim().min(1).max(4000),
});

function failure(err: unknown) {
  if (err instanceof ConfigurationError) {
    return NextResponse.json({ ok: false, error: err.message, missing: err.missing }, { status: 503 });
  }
  logger.error(`Chat request failed: ${errorMessage(err)}`);
  return NextResponse.json({ ok: false, error: "Internal error" }, { status: 500 });
}

export async function POST(request: Request) {
  const parsed = PostBodySchema.safeParse(await request.json().catch(() => null));
  if (!parsed.success) {
    return NextResponse.json({ ok: false, error: parsed.error.flatten() }, { status: 400 });
  }

  try {
    const assistant = await getAssistant();
    const turn = await assistant.handleMessage(parsed.data);
    return NextResponse.json({ ok: true, ...turn }, { status: 200 });
  } catch (err) {
    return failure(err);
  }
}

export async function GET(request: Request) {
  const raw = new URL(request.url).searchParams.get("sessionId");
  const sessionId = raw ? SessionIdSchema.safeParse(raw) : null;
  if (sessionId && !sessionId.success) {
    return NextResponse.json({ ok: false, error: sessionId.error.flatten() }, { status: 400 });
  }

  try {
    const assistant = await getAssistant();
    const ctx = await assistant.openSession(sessionId?.data);
    return NextResponse.json(
      { ok: true, sessionId: ctx.id, state: ctx.state, messages: ctx.messages },
      { status: 200 }
    );
  } catch (err) {
    return failure(err);
  }
}
