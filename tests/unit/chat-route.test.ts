import { GET, POST } from "@/app/api/chat/route";

function post(body: unknown) {
  return new Request("http://localhost/api/chat", {
    method: "POST",
    headers: { "content-type": "application/json" },
    body: JSON.stringify(body),
  });
}

describe("/api/chat input validation", () => {
  it("rejects an empty message", async () => {
    const res = await POST(post({ message: "   " }));

    expect(res.status).toBe(400);
    expect((await res.json()).ok).toBe(false);
  });

  it("rejects a malformed session id", async () => {
    const res = await POST(post({ sessionId: "../etc", message: "yes" }));
    expect(res.status).toBe(400);
  });

  it("rejects a body that is not JSON", async () => {
    const res = await POST(new Request("http://localhost/api/chat", { method: "POST", body: "yes" }));
    expect(res.status).toBe(400);
  });

  it("rejects a malformed session id in the query", async () => {
    const res = await GET(new Request("http://localhost/api/chat?sessionId=a%20b"));
    expect(res.status).toBe(400);
  });
});
