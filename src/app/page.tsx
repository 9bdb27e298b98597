import ChatView from "@/components/chat/ChatView";
import MissingConfiguration from "@/components/MissingConfiguration";
import { env, getMissingRequiredEnv } from "@/lib/env";

export const dynamic = "force-dynamic";

export default function HomePage() {
  const missing = getMissingRequiredEnv();
  if (missing.length > 0) {
    return <MissingConfiguration missing={missing} />;
  }

  return <ChatView brandName={env.BRAND_NAME} />;
}
