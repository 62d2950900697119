import fs from "node:fs";
import http from "node:http";
import net from "node:net";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import register from "./index.js";
import { resolveConfig } from "./src/config.js";
import { FitnessTrackerDb } from "./src/db.js";
import { createHttpHost, type HttpHost, type HttpResponse } from "./src/host.js";

let tmpDir: string;
let db: FitnessTrackerDb;

function fakeLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

function createRequest(method: string, url: string, body?: string): http.IncomingMessage {
  const req = new http.IncomingMessage(new net.Socket());
  req.method = method;
  req.url = url;
  process.nextTick(() => {
    if (body !== undefined) {
      req.emit("data", body);
    }
    req.emit("end");
  });
  return req;
}

class MockResponse implements HttpResponse {
  statusCode = 200;
  headers: Record<string, string> = {};
  body = "";

  setHeader(key: string, value: string) {
    this.headers[key.toLowerCase()] = value;
  }

  end(data?: string | Buffer) {
    if (data) {
      this.body += typeof data === "string" ? data : data.toString("utf-8");
    }
  }
}

async function request(host: HttpHost, method: string, url: string, body?: unknown) {
  const res = new MockResponse();
  await host.dispatch(
    createRequest(method, url, body === undefined ? undefined : JSON.stringify(body)),
    res,
  );
  return res;
}

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "fitness-tracker-register-test-"));
  db = new FitnessTrackerDb(path.join(tmpDir, "test.db"));
});

afterEach(() => {
  db.close();
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("register", () => {
  it("wires forms, API routes and the dashboard onto the host", async () => {
    const logger = fakeLogger();
    const host = createHttpHost(resolveConfig({ FITNESS_TRACKER_STATE_DIR: tmpDir }), logger);
    register(host, { store: db, onExit: vi.fn() });

    const posted = await request(host, "POST", "/api/nutrition", {
      foodItem: "Apple",
      calories: "95",
      carbs: "",
      protein: "",
      fats: "",
    });
    expect(posted.statusCode).toBe(201);

    const listed = await request(host, "GET", "/api/nutrition");
    expect(JSON.parse(listed.body)).toMatchObject({
      lines: [
        `Apple - 95 cal - 0g carbs - 0g protein - 0g fats - ${new Date().toISOString().slice(0, 10)}`,
      ],
    });

    const page = await request(host, "GET", "/");
    expect(page.headers["content-type"]).toBe("text/html; charset=utf-8");
    expect(page.body).toContain("<title>Fitness and Health Tracker</title>");
  });

  it("keeps working without the decorative pictures", async () => {
    const logger = fakeLogger();
    const host = createHttpHost(resolveConfig({ FITNESS_TRACKER_STATE_DIR: tmpDir }), logger);

    const { images } = register(host, { store: db, onExit: vi.fn() });

    expect(images).toEqual([]);
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect((await request(host, "GET", "/assets/activity")).statusCode).toBe(404);

    const goals = await request(host, "PUT", "/api/goals", {
      weeklyExerciseGoal: "5",
      dailyCalorieLimit: "2000",
    });
    expect(goals.statusCode).toBe(200);
  });

  it("serves a picture that exists", async () => {
    const imagesDir = path.join(tmpDir, "images");
    fs.mkdirSync(imagesDir);
    fs.writeFileSync(path.join(imagesDir, "activity.jpg"), "jpeg-bytes");
    const host = createHttpHost(
      resolveConfig({ FITNESS_TRACKER_STATE_DIR: tmpDir }),
      fakeLogger(),
    );

    register(host, { store: db, onExit: vi.fn() });

    const listed = await request(host, "GET", "/api/images");
    expect(JSON.parse(listed.body)).toEqual({
      images: [{ name: "activity", url: "/assets/activity" }],
    });

    const picture = await request(host, "GET", "/assets/activity");
    expect(picture.headers["content-type"]).toBe("image/jpeg");
    expect(picture.body).toBe("jpeg-bytes");
  });

  it("passes confirmed exits to the caller", async () => {
    const onExit = vi.fn();
    const host = createHttpHost(
      resolveConfig({ FITNESS_TRACKER_STATE_DIR: tmpDir }),
      fakeLogger(),
    );
    register(host, { store: db, onExit });

    await request(host, "POST", "/api/exit", { confirm: true });

    expect(onExit).toHaveBeenCalledTimes(1);
  });
});
