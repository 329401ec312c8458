import { describe, it, expect, vi } from "vitest";
import { pruneLedger } from "../ledger.js";
import { LedgerRetentionError } from "../errors.js";
import { CachedPluginDirectory } from "../stores/cachedPluginDirectory.js";
import { MemoryEventLedger } from "../stores/memoryEventLedger.js";
import { MemoryLicenseStore } from "../stores/memoryLicenseStore.js";
import { MemoryUnitOfWork } from "../stores/memoryUnitOfWork.js";
import { MemoryPluginDirectory } from "../stores/memoryPluginDirectory.js";
import { RedisMailQueue } from "../stores/redisStores.js";
import { acmeTool } from "./fixtures.js";

const DAY = 24 * 60 * 60 * 1000;

describe("pruneLedger", () => {
  it("removes records applied before the retention cutoff", async () => {
    let now = new Date(0);
    const ledger = new MemoryEventLedger(() => now);
    await ledger.recordIfNew("evt_old", "invoice.paid");
    now = new Date(40 * DAY);
    await ledger.recordIfNew("evt_new", "invoice.paid");

    const result = await pruneLedger(ledger, 30, new Date(45 * DAY));

    expect(result).toEqual({ cutoff: new Date(15 * DAY), removed: 1 });
    expect(ledger.size).toBe(1);
    expect((await ledger.recordIfNew("evt_new", "invoice.paid")).firstTime).toBe(false);
    expect((await ledger.recordIfNew("evt_old", "invoice.paid")).firstTime).toBe(true);
  });

  it("refuses a retention shorter than thirty days", async () => {
    const ledger = new MemoryEventLedger();
    await expect(pruneLedger(ledger, 29)).rejects.toBeInstanceOf(LedgerRetentionError);
    await expect(pruneLedger(ledger, Number.NaN)).rejects.toThrow("Retention must be at least 30 days, got NaN");
  });
});

describe("MemoryEventLedger", () => {
  it("forgets a dropped claim", async () => {
    const ledger = new MemoryEventLedger();
    await ledger.recordIfNew("evt_1", "invoice.paid");
    ledger.forget("evt_1");
    expect((await ledger.recordIfNew("evt_1", "invoice.paid")).firstTime).toBe(true);
  });
});

describe("MemoryUnitOfWork", () => {
  it("keeps the claims of a run that succeeds", async () => {
    const ledger = new MemoryEventLedger();
    const uow = new MemoryUnitOfWork(ledger, new MemoryLicenseStore());

    await uow.run((stores) => stores.ledger.recordIfNew("evt_1", "invoice.paid"));

    expect(ledger.size).toBe(1);
  });

  it("drops the claims of a run that fails and rethrows", async () => {
    const ledger = new MemoryEventLedger();
    await ledger.recordIfNew("evt_0", "invoice.paid");
    const uow = new MemoryUnitOfWork(ledger, new MemoryLicenseStore());

    await expect(
      uow.run(async (stores) => {
        await stores.ledger.recordIfNew("evt_0", "invoice.paid");
        await stores.ledger.recordIfNew("evt_1", "invoice.paid");
        throw new Error("db down");
      })
    ).rejects.toThrow("db down");

    expect(ledger.size).toBe(1);
    expect((await ledger.recordIfNew("evt_0", "invoice.paid")).firstTime).toBe(false);
    expect((await ledger.recordIfNew("evt_1", "invoice.paid")).firstTime).toBe(true);
  });
});

describe("CachedPluginDirectory", () => {
  it("serves repeated lookups from the cache under either key", async () => {
    const inner = new MemoryPluginDirectory([acmeTool]);
    const bySlug = vi.spyOn(inner, "findBySlug");
    const byId = vi.spyOn(inner, "findById");
    const cached = new CachedPluginDirectory(inner);

    expect(await cached.findBySlug("acme-tool")).toEqual(acmeTool);
    expect(await cached.findBySlug("acme-tool")).toEqual(acmeTool);
    expect(await cached.findById("plg_acme")).toEqual(acmeTool);

    expect(bySlug).toHaveBeenCalledTimes(1);
    expect(byId).not.toHaveBeenCalled();
  });

  it("does not cache misses", async () => {
    const inner = new MemoryPluginDirectory();
    const bySlug = vi.spyOn(inner, "findBySlug");
    const cached = new CachedPluginDirectory(inner);

    expect(await cached.findBySlug("new-tool")).toBeNull();
    expect(await cached.findBySlug("new-tool")).toBeNull();
    expect(bySlug).toHaveBeenCalledTimes(2);
  });

  it("reloads after clear", async () => {
    const inner = new MemoryPluginDirectory([acmeTool]);
    const byId = vi.spyOn(inner, "findById");
    const cached = new CachedPluginDirectory(inner);

    await cached.findById("plg_acme");
    cached.clear();
    await cached.findById("plg_acme");
    expect(byId).toHaveBeenCalledTimes(2);
  });
});

describe("RedisMailQueue", () => {
  it("pushes a JSON job onto the mail list", async () => {
    const client = { lPush: vi.fn().mockResolvedValue(1) };
    const queue = new RedisMailQueue({ client });

    await queue.enqueue({
      licenseKey: "K".repeat(32),
      email: "u@example.com",
      pluginId: "plg_acme",
      pluginSlug: "acme-tool",
      pluginName: "Acme Tool",
    });

    expect(client.lPush).toHaveBeenCalledTimes(1);
    const [key, payload] = client.lPush.mock.calls[0];
    expect(key).toBe("keyturn:mail:license-created");
    expect(JSON.parse(payload)).toEqual({
      type: "license_created",
      licenseKey: "K".repeat(32),
      email: "u@example.com",
      pluginId: "plg_acme",
      pluginSlug: "acme-tool",
      pluginName: "Acme Tool",
    });
  });
});
