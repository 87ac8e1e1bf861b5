import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { ConfigurationError, NotInitializedError } from "./errors.js";
import { Logger, NOOP_LOGGER } from "./logger.js";
import { LoggerRegistry } from "./registry.js";
import type { LogSink, LoggerConfig } from "./types.js";

class MemorySink implements LogSink {
    readonly chunks: string[] = [];
    closed = false;

    constructor(readonly path: string) {}

    append(chunk: string): void {
        this.chunks.push(chunk);
    }

    close(): void {
        this.closed = true;
    }
}

function memoryFactory() {
    const configs: LoggerConfig[] = [];
    const factory = vi.fn(async (config: LoggerConfig) => {
        configs.push(config);
        // 让并发调用真正交错
        await new Promise((resolve) => setTimeout(resolve, 5));
        return new Logger({
            name: config.name,
            level: config.level,
            sink: new MemorySink(path.join(config.dir, config.filename)),
        });
    });
    return { factory, configs };
}

describe("LoggerRegistry", () => {
    let dir: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), "logroll-registry-"));
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    describe("initializeNamed", () => {
        it("should construct a logger once under concurrent initialization", async () => {
            const { factory } = memoryFactory();
            const registry = new LoggerRegistry({ factory });

            const results = await Promise.all(
                Array.from({ length: 16 }, () => registry.initializeNamed("worker", "debug", dir)),
            );

            expect(factory).toHaveBeenCalledTimes(1);
            expect(results.every((r) => r.ok)).toBe(true);
            const first = results[0];
            if (!first.ok) throw first.error;
            for (const r of results) {
                expect(r.ok && r.logger).toBe(first.logger);
            }
            expect(registry.lookup("worker")).toBe(first.logger);
        });

        it("should keep the first configuration for a name", async () => {
            const { factory, configs } = memoryFactory();
            const registry = new LoggerRegistry({ factory });

            await registry.initializeNamed("billing", "debug", dir);
            const again = await registry.initializeNamed("billing", "error", path.join(dir, "elsewhere"));

            expect(again.ok).toBe(true);
            expect(factory).toHaveBeenCalledTimes(1);
            expect(configs[0].level).toBe("debug");
            expect(registry.lookup("billing").level).toBe("debug");
        });

        it("should default the file name to <name>.log", async () => {
            const { factory, configs } = memoryFactory();
            const registry = new LoggerRegistry({ factory });

            await registry.initializeNamed("billing", "info", dir);
            await registry.initializeNamed("audit", "info", dir, { filename: "audit-trail.log" });

            expect(configs.map((c) => c.filename)).toEqual(["billing.log", "audit-trail.log"]);
            expect(configs[0].name).toBe("billing");
        });

        it("should reject an empty name", async () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });

            const result = await registry.initializeNamed("", "info", dir);

            expect(result.ok).toBe(false);
            expect(!result.ok && result.error.message).toBe("Logger name must not be empty");
        });

        it("should not cache a failed construction", async () => {
            const { factory } = memoryFactory();
            factory.mockImplementationOnce(async () => {
                throw new Error("disk unavailable");
            });
            const registry = new LoggerRegistry({ factory });

            const failed = await registry.initializeNamed("jobs", "info", dir);
            expect(failed.ok).toBe(false);
            expect(!failed.ok && failed.error).toBeInstanceOf(ConfigurationError);
            expect(!failed.ok && failed.error.message).toBe("Failed to create logger: disk unavailable");
            expect(registry.has("jobs")).toBe(false);

            const retried = await registry.initializeNamed("jobs", "info", dir);
            expect(retried.ok).toBe(true);
            expect(registry.has("jobs")).toBe(true);
        });

        it("should report an unwritable directory as a ConfigurationError", async () => {
            const blocker = path.join(dir, "blocker");
            fs.writeFileSync(blocker, "not a directory");
            const registry = new LoggerRegistry();

            const result = await registry.initializeNamed("svc", "info", path.join(blocker, "logs"));

            expect(result.ok).toBe(false);
            expect(!result.ok && result.error).toBeInstanceOf(ConfigurationError);
            expect(registry.names()).toEqual([]);
        });

        it("should write to <dir>/<name>.log with the default factory", async () => {
            const registry = new LoggerRegistry({ clock: () => 0n });

            const result = await registry.initializeNamed("svc", "info", dir, { reportCaller: false });
            if (!result.ok) throw result.error;
            result.logger.info("hello");
            registry.close();

            expect(fs.readFileSync(path.join(dir, "svc.log"), "utf-8")).toBe(
                '{"time":"1970-01-01T00:00:00.000000000Z","level":"INFO","logger":"svc","line":0,"msg":"hello"}\n',
            );
        });
    });

    describe("initializeDefault", () => {
        it("should construct the default logger exactly once", async () => {
            const { factory, configs } = memoryFactory();
            const registry = new LoggerRegistry({ factory });

            const results = await Promise.all([
                registry.initializeDefault("info", dir),
                registry.initializeDefault("debug", path.join(dir, "other")),
                registry.initializeDefault("error", dir),
            ]);

            expect(factory).toHaveBeenCalledTimes(1);
            expect(configs[0]).toMatchObject({ name: undefined, level: "info", filename: "app.log" });
            const loggers = results.map((r) => (r.ok ? r.logger : undefined));
            expect(loggers[0]).toBeDefined();
            expect(new Set(loggers).size).toBe(1);
            expect(registry.defaultLogger).toBe(loggers[0]);
        });

        it("should hand every caller the same error when construction fails", async () => {
            const factory = vi.fn(async (): Promise<Logger> => {
                throw new ConfigurationError("Cannot create log directory /nope");
            });
            const registry = new LoggerRegistry({ factory });

            const first = await registry.initializeDefault("info", dir);
            const second = await registry.initializeDefault("info", dir);

            expect(factory).toHaveBeenCalledTimes(1);
            expect(first.ok).toBe(false);
            expect(second.ok).toBe(false);
            expect(!first.ok && first.error.message).toBe("Cannot create log directory /nope");
            expect(!first.ok && !second.ok && first.error === second.error).toBe(true);
            expect(registry.defaultLogger).toBeUndefined();
        });
    });

    describe("file ownership", () => {
        it("should refuse a named logger that reuses the default logger's file", async () => {
            const { factory } = memoryFactory();
            const registry = new LoggerRegistry({ factory });

            await registry.initializeDefault("info", dir);
            const clash = await registry.initializeNamed("app", "info", dir);

            expect(clash.ok).toBe(false);
            expect(!clash.ok && clash.error).toBeInstanceOf(ConfigurationError);
            expect(!clash.ok && clash.error.message).toBe(
                `Log file ${path.join(dir, "app.log")} is already used by the default logger`,
            );
            expect(factory).toHaveBeenCalledTimes(1);
            expect(registry.has("app")).toBe(false);
        });

        it("should refuse two named loggers sharing a file name", async () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });

            await registry.initializeNamed("a", "info", dir, { filename: "shared.log" });
            const clash = await registry.initializeNamed("b", "info", dir, { filename: "shared.log" });

            expect(!clash.ok && clash.error.message).toBe(
                `Log file ${path.join(dir, "shared.log")} is already used by logger 'a'`,
            );
        });

        it("should count the error mirror as an owned file", async () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });

            await registry.initializeNamed("svc", "info", dir, { errorSplit: true });
            const clash = await registry.initializeNamed("svc_error", "info", dir);

            expect(!clash.ok && clash.error.message).toBe(
                `Log file ${path.join(dir, "svc_error.log")} is already used by logger 'svc'`,
            );
        });

        it("should refuse concurrent claims on the same file", async () => {
            const { factory } = memoryFactory();
            const registry = new LoggerRegistry({ factory });

            const [first, second] = await Promise.all([
                registry.initializeDefault("info", dir),
                registry.initializeNamed("app", "info", dir),
            ]);

            expect(first.ok).toBe(true);
            expect(second.ok).toBe(false);
            expect(factory).toHaveBeenCalledTimes(1);
        });

        it("should allow the same file name in another directory", async () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });

            await registry.initializeDefault("info", dir);
            const other = await registry.initializeNamed("app", "info", path.join(dir, "other"));

            expect(other.ok).toBe(true);
        });

        it("should release the files of a failed construction", async () => {
            const { factory } = memoryFactory();
            factory.mockImplementationOnce(async () => {
                throw new Error("disk unavailable");
            });
            const registry = new LoggerRegistry({ factory });

            const failed = await registry.initializeNamed("a", "info", dir, { filename: "shared.log" });
            const next = await registry.initializeNamed("b", "info", dir, { filename: "shared.log" });

            expect(failed.ok).toBe(false);
            expect(next.ok).toBe(true);
        });

        it("should keep rotation clean when a logger for the same file is refused", async () => {
            const registry = new LoggerRegistry({ clock: () => 0n });
            const rotation = { maxSize: 150 };

            const base = await registry.initializeDefault("info", dir, { rotation, reportCaller: false });
            const clash = await registry.initializeNamed("app", "info", dir, { rotation, reportCaller: false });
            if (!base.ok) throw base.error;
            for (let i = 0; i < 4; i++) base.logger.info(`event ${i}`);
            registry.close();

            expect(clash.ok).toBe(false);
            // 每行 82 字节：第 2 行写完 164 > 150 时轮转
            expect(fs.readdirSync(dir).sort()).toEqual(["app.1.log", "app.2.log", "app.log"]);
            expect(fs.readFileSync(path.join(dir, "app.log"), "utf-8")).toBe("");
        });
    });

    describe("lookup", () => {
        it("should fall back to the default logger for unknown names", async () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });
            const init = await registry.initializeDefault("info", dir);
            if (!init.ok) throw init.error;

            expect(registry.lookup("unknown")).toBe(init.logger);
            expect(registry.tryLookup("unknown")).toBe(init.logger);
        });

        it("should prefer a named logger over the default", async () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });
            await registry.initializeDefault("info", dir);
            const named = await registry.initializeNamed("billing", "info", dir);
            if (!named.ok) throw named.error;

            expect(registry.lookup("billing")).toBe(named.logger);
            expect(registry.lookup("billing")).not.toBe(registry.defaultLogger);
        });

        it("should throw NotInitializedError when nothing matches", () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });

            expect(() => registry.lookup("ghost")).toThrow(NotInitializedError);
            expect(() => registry.lookup("ghost")).toThrow(
                "Logger 'ghost' is not initialized and no default logger is configured",
            );
            expect(registry.tryLookup("ghost")).toBeUndefined();
            expect(registry.lookupOrNoop("ghost")).toBe(NOOP_LOGGER);
        });
    });

    describe("initializeFromFile", () => {
        it("should initialize the default and every named logger", async () => {
            const { factory, configs } = memoryFactory();
            const registry = new LoggerRegistry({ factory });
            const file = path.join(dir, "logging.json");
            fs.writeFileSync(
                file,
                JSON.stringify({
                    default: { level: "warn", dir },
                    loggers: [
                        { name: "billing", level: "debug", dir, errorSplit: true, rotation: { maxSize: "1KB" } },
                        { name: "audit", dir },
                    ],
                }),
            );

            const result = await registry.initializeFromFile(file);

            expect(result.default?.ok).toBe(true);
            expect(Object.keys(result.loggers)).toEqual(["billing", "audit"]);
            expect(registry.names()).toEqual(["billing", "audit"]);
            expect(configs.map((c) => [c.name, c.level, c.filename])).toEqual([
                [undefined, "warn", "app.log"],
                ["billing", "debug", "billing.log"],
                ["audit", "info", "audit.log"],
            ]);
            expect(configs[1].rotation.maxSize).toBe(1024);
            expect(configs[1].errorSplit).toBe(true);
        });

        it("should reject a malformed file", async () => {
            const registry = new LoggerRegistry({ factory: memoryFactory().factory });
            const file = path.join(dir, "logging.json");
            fs.writeFileSync(file, JSON.stringify({ loggers: [{ name: "", dir }] }));

            await expect(registry.initializeFromFile(file)).rejects.toThrow(ConfigurationError);
        });
    });

    it("should close every logger it owns", async () => {
        const sinks: MemorySink[] = [];
        const registry = new LoggerRegistry({
            factory: (config) => {
                const sink = new MemorySink(config.filename);
                sinks.push(sink);
                return new Logger({ name: config.name, sink });
            },
        });
        await registry.initializeDefault("info", dir);
        await registry.initializeNamed("a", "info", dir);

        registry.close();

        expect(sinks.map((s) => s.closed)).toEqual([true, true]);
    });
});
