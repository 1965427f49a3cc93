import { describe, expect, it } from "vitest";
import { isTelegramUpdate, TelegramApiError, TelegramClient } from "../../src/telegram";
import { FakeHttp } from "../helpers/fakeHttp";

function client(http: FakeHttp): TelegramClient {
  return new TelegramClient({
    token: "test-token",
    apiBaseUrl: "https://telegram.test/",
    fetchFn: http.fetch,
    requestTimeoutMs: 1_000,
  });
}

describe("TelegramClient", () => {
  it("long-polls for updates from the given offset and drops malformed entries", async () => {
    const http = new FakeHttp().on("POST", "/bottest-token/getUpdates", {
      body: JSON.stringify({
        ok: true,
        result: [
          { update_id: 10, message: { message_id: 1, chat: { id: 77 }, text: "/check" } },
          { update_id: "11" },
          { update_id: 12 },
        ],
      }),
    });

    const batch = await client(http).getUpdates(10, 25);

    expect(batch.updates).toEqual([
      { update_id: 10, message: { message_id: 1, chat: { id: 77 }, text: "/check" } },
      { update_id: 12 },
    ]);
    expect(batch.nextOffset).toBe(13);
    expect(JSON.parse(http.requests[0].body ?? "")).toEqual({ offset: 10, timeout: 25, allowed_updates: ["message"] });
  });

  it("acknowledges a malformed entry that carries an integer update id", async () => {
    const http = new FakeHttp().on("POST", "/bottest-token/getUpdates", {
      body: JSON.stringify({
        ok: true,
        result: [
          { update_id: 20, message: { message_id: 1, chat: { id: 77 }, text: "/help" } },
          { update_id: 21, message: { message_id: 2, chat: {} } },
        ],
      }),
    });

    const batch = await client(http).getUpdates(20, 25);

    expect(batch.updates).toHaveLength(1);
    expect(batch.nextOffset).toBe(22);
  });

  it("leaves the offset alone when no entry has an integer update id", async () => {
    const http = new FakeHttp().on("POST", "/bottest-token/getUpdates", {
      body: JSON.stringify({ ok: true, result: [{ update_id: "30" }, null] }),
    });

    const batch = await client(http).getUpdates(30, 25);

    expect(batch).toEqual({ updates: [], nextOffset: undefined });
  });

  it("sends text messages as JSON", async () => {
    const http = new FakeHttp().on("POST", "/bottest-token/sendMessage", { body: '{"ok":true,"result":{}}' });

    await client(http).sendMessage(77, "Checking your results...");

    expect(http.requests[0].headers["Content-Type"]).toBe("application/json");
    expect(JSON.parse(http.requests[0].body ?? "")).toEqual({ chat_id: 77, text: "Checking your results..." });
  });

  it("rejects non-JSON responses", async () => {
    const http = new FakeHttp().on("POST", "/bottest-token/sendMessage", { status: 502, body: "<html>Bad Gateway</html>" });

    await expect(client(http).sendMessage(77, "hi")).rejects.toThrow(
      new TelegramApiError("sendMessage returned HTTP 502 with a non-JSON body"),
    );
  });

  it("rejects a getUpdates result that is not a list", async () => {
    const http = new FakeHttp().on("POST", "/bottest-token/getUpdates", { body: '{"ok":true,"result":{}}' });

    await expect(client(http).getUpdates(undefined, 0)).rejects.toThrow("getUpdates returned a non-array result");
  });
});

describe("isTelegramUpdate", () => {
  it("requires an integer update id and a well-formed message", () => {
    expect(isTelegramUpdate({ update_id: 1 })).toBe(true);
    expect(isTelegramUpdate({ update_id: 1, message: { message_id: 2, chat: { id: 3 } } })).toBe(true);
    expect(isTelegramUpdate({ update_id: 1, message: { message_id: 2, chat: {} } })).toBe(false);
    expect(isTelegramUpdate({ update_id: 1, message: { message_id: 2, chat: { id: 3 }, text: 4 } })).toBe(false);
    expect(isTelegramUpdate(null)).toBe(false);
  });
});
