// ============================================
// API Tests — POST / end to end, in process
// ============================================

import { describe, it, expect, vi } from "vitest";
import request from "supertest";
import { createApp } from "../src/app.js";
import { logger } from "../src/lib/logger.js";

const VALID_NUMBER = "4003600000000014";
const INVALID_NUMBER = "4003600000000015";

describe("POST /", () => {
  const app = createApp({ checkMode: "passthrough" });

  it("returns valid: true for a number that passes the checksum", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: VALID_NUMBER }));

    expect(res.status).toBe(200);
    expect(res.headers["content-type"]).toMatch(/^application\/json/);
    expect(res.text).toBe('{"valid":true}');
  });

  it("returns 200 with valid: false for a failed checksum", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: INVALID_NUMBER }));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: false });
  });

  it("reads the body whatever its Content-Type", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "text/plain")
      .send(JSON.stringify({ number: VALID_NUMBER }));

    expect(res.status).toBe(200);
    expect(res.text).toBe('{"valid":true}');
  });

  it("ignores unknown fields", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: VALID_NUMBER, holder: "Test User" }));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: true });
  });

  it("treats a missing number field as an empty card number", async () => {
    const res = await request(app).post("/").set("Content-Type", "application/json").send("{}");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: true });
  });

  it("treats a null payload as an empty object", async () => {
    const res = await request(app).post("/").set("Content-Type", "application/json").send("null");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: true });
  });

  it("treats a null number as an empty card number", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send('{"number": null}');

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: true });
  });

  it("matches the number key case-insensitively", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ Number: INVALID_NUMBER }));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: false });
  });

  it("lets the last non-null matching key win", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(`{"number": "${VALID_NUMBER}", "NUMBER": "${INVALID_NUMBER}", "Number": null}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: false });
  });

  it("passes non-digit characters to the checksum unchecked", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: ":" }));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ valid: true });
  });

  it("returns identical responses for identical requests", async () => {
    const send = () =>
      request(app)
        .post("/")
        .set("Content-Type", "application/json")
        .send(JSON.stringify({ number: VALID_NUMBER }));

    const first = await send();
    const second = await send();

    expect(second.status).toBe(first.status);
    expect(second.text).toBe(first.text);
  });
});

describe("method enforcement", () => {
  const app = createApp({ checkMode: "passthrough" });

  it("rejects GET with 405 and a plain-text body", async () => {
    const res = await request(app).get("/");

    expect(res.status).toBe(405);
    expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(res.headers["x-content-type-options"]).toBe("nosniff");
    expect(res.text).toBe("Invalid request method");
  });

  it("rejects PUT and DELETE with 405", async () => {
    const put = await request(app).put("/").send(JSON.stringify({ number: VALID_NUMBER }));
    const del = await request(app).delete("/");

    expect(put.status).toBe(405);
    expect(put.text).toBe("Invalid request method");
    expect(del.status).toBe(405);
  });

  it("leaves other paths to the default 404", async () => {
    const res = await request(app)
      .post("/validate")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: VALID_NUMBER }));

    expect(res.status).toBe(404);
  });
});

describe("body decoding failures", () => {
  const app = createApp({ checkMode: "passthrough", bodyLimit: "64b" });

  it("rejects malformed JSON with 400", async () => {
    const res = await request(app).post("/").set("Content-Type", "application/json").send("not json");

    expect(res.status).toBe(400);
    expect(res.headers["content-type"]).toBe("text/plain; charset=utf-8");
    expect(res.text).toBe("Invalid JSON payload");
  });

  it("rejects an empty body with 400", async () => {
    const res = await request(app).post("/").set("Content-Type", "application/json");

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid JSON payload");
  });

  it("rejects a non-string number with 400", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send('{"number": 4003600000000014}');

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid JSON payload");
  });

  it("rejects a non-string value under a differently cased key", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send('{"NUMBER": 4003600000000014}');

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid JSON payload");
  });

  it("rejects data after the first JSON value with 400", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(`{"number":"${VALID_NUMBER}"} trailing`);

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid JSON payload");
  });

  it("rejects a JSON array with 400", async () => {
    const res = await request(app).post("/").set("Content-Type", "application/json").send("[]");

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid JSON payload");
  });

  it("rejects a body over the size limit with 400", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: "0".repeat(100) }));

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid JSON payload");
  });

  it("maps an unsupported charset to 400 and logs the error code", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json; charset=foo")
      .send(JSON.stringify({ number: VALID_NUMBER }));

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid JSON payload");
    expect(vi.mocked(logger.error)).toHaveBeenCalledWith(
      "Request failed",
      expect.objectContaining({
        stage: "api",
        appError: expect.objectContaining({
          code: "INVALID_JSON_PAYLOAD",
          message: "Request body could not be read",
        }),
      })
    );
  });
});

describe("strict mode", () => {
  const app = createApp({ checkMode: "strict" });

  it("rejects non-digit characters with 400", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: "4003-6000-0000-0014" }));

    expect(res.status).toBe(400);
    expect(res.text).toBe("Invalid card number");
  });

  it("still checks digit-only numbers", async () => {
    const valid = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: VALID_NUMBER }));
    const invalid = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: INVALID_NUMBER }));

    expect(valid.body).toEqual({ valid: true });
    expect(invalid.body).toEqual({ valid: false });
  });
});

describe("response encoding failure", () => {
  it("returns 500 when the result cannot be serialized", async () => {
    const app = createApp({
      checkMode: "passthrough",
      encodeResponse: () => {
        throw new Error("encoder unavailable");
      },
    });

    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: VALID_NUMBER }));

    expect(res.status).toBe(500);
    expect(res.text).toBe("Error creating response");
  });
});

describe("request IDs", () => {
  const app = createApp({ checkMode: "passthrough" });

  it("echoes an incoming x-request-id", async () => {
    const res = await request(app).get("/").set("X-Request-Id", "req-123");

    expect(res.headers["x-request-id"]).toBe("req-123");
  });

  it("generates an 8-character id when none is sent", async () => {
    const res = await request(app)
      .post("/")
      .set("Content-Type", "application/json")
      .send(JSON.stringify({ number: VALID_NUMBER }));

    expect(res.headers["x-request-id"]).toMatch(/^[0-9a-f]{8}$/);
  });
});
