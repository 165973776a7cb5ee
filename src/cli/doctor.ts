import "dotenv/config";
import WebSocket from "ws";
import { loadConfig } from "../config.js";
import { silentLogger } from "../logger.js";
import { JsonFileReminderStore } from "../reminders/store.js";
import { errorMessage } from "../utils/async.js";

type CheckResult = { ok: boolean; detail: string };

async function checkHttp(httpUrl: string, token?: string): Promise<CheckResult> {
  const base = httpUrl.replace(/\/+$/, "");
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), 800);
  try {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (token) headers["Authorization"] = `Bearer ${token}`;
    const res = await fetch(`${base}/get_status`, { method: "POST", headers, body: "{}", signal: controller.signal });
    const text = await res.text();
    if (res.ok) return { ok: true, detail: `get_status: ${text.slice(0, 180)}` };
    return { ok: false, detail: `get_status: ${res.status} ${text.slice(0, 180)}` };
  } catch (e) {
    return { ok: false, detail: `get_status: ${errorMessage(e)}` };
  } finally {
    clearTimeout(timer);
  }
}

function checkWs(wsUrl: string, token?: string): Promise<CheckResult> {
  return new Promise((resolve) => {
    const headers: Record<string, string> = {};
    if (token) headers["Authorization"] = `Bearer ${token}`;
    const ws = new WebSocket(wsUrl, { headers });
    const timer = setTimeout(() => {
      ws.terminate();
      resolve({ ok: false, detail: "timeout" });
    }, 800);

    ws.on("open", () => {
      clearTimeout(timer);
      ws.close();
      resolve({ ok: true, detail: "connected" });
    });
    ws.on("error", (err: Error) => {
      clearTimeout(timer);
      resolve({ ok: false, detail: err.message });
    });
  });
}

async function checkStore(dataDir: string): Promise<CheckResult> {
  try {
    const store = new JsonFileReminderStore(dataDir, silentLogger);
    const rows = await store.list();
    const now = Date.now();
    const overdue = rows.filter((r) => r.nextFireAtMs !== null && r.nextFireAtMs <= now).length;
    const idle = rows.filter((r) => r.nextFireAtMs === null).length;
    return { ok: true, detail: `${store.filePath}: ${rows.length} reminder(s), ${overdue} overdue, ${idle} without a next fire` };
  } catch (e) {
    return { ok: false, detail: errorMessage(e) };
  }
}

const cfg = loadConfig();

console.log("Settings:");
console.log("  NAPCAT_HTTP_URL =", cfg.NAPCAT_HTTP_URL);
console.log("  NAPCAT_WS_URL   =", cfg.NAPCAT_WS_URL);
console.log("  TIMEZONE        =", cfg.TIMEZONE);
console.log("  DATA_DIR        =", cfg.DATA_DIR);
console.log("");

const http = await checkHttp(cfg.NAPCAT_HTTP_URL, cfg.NAPCAT_HTTP_TOKEN);
const ws = await checkWs(cfg.NAPCAT_WS_URL, cfg.NAPCAT_WS_TOKEN);
const store = cfg.REMINDER_STORE === "file" ? await checkStore(cfg.DATA_DIR) : { ok: true, detail: "memory store, nothing persisted" };

console.log("Checks:");
console.log("  HTTP :", http.ok ? "OK" : "FAIL", "-", http.detail);
console.log("  WS   :", ws.ok ? "OK" : "FAIL", "-", ws.detail);
console.log("  Store:", store.ok ? "OK" : "FAIL", "-", store.detail);
console.log("");

if (!ws.ok) {
  console.log("A failed WS check usually means NapCat is not running or NAPCAT_WS_URL points at the wrong port.");
  console.log("");
}

process.exitCode = http.ok && ws.ok && store.ok ? 0 : 1;
