/**
 * Health Monitor - 定时健康检查
 *
 * 按固定间隔运行检查函数：健康时记录 INFO "OK!"，否则记录 ERROR。
 * 上一次检查尚未结束时跳过本次 tick，避免堆积。
 */

import type { StructuredLogger } from "../logger/logger.js";

export type HealthCheck = () => boolean | Promise<boolean>;

export interface HealthMonitorOptions {
    logger: StructuredLogger;
    /** 检查间隔毫秒 */
    intervalMs: number;
    check: HealthCheck;
}

export interface HealthResult {
    status: "healthy" | "unhealthy" | "skipped";
    reason?: string;
}

export interface HealthMonitorHandle {
    /** 停止定时检查 */
    stop: () => void;
    /** 立即执行一次检查 */
    runOnce: () => Promise<HealthResult>;
}

export function startHealthMonitor(options: HealthMonitorOptions): HealthMonitorHandle {
    const { logger, intervalMs, check } = options;

    let timer: ReturnType<typeof setInterval> | null = null;
    let running = false;

    const runOnce = async (): Promise<HealthResult> => {
        if (running) {
            return { status: "skipped", reason: "previous-check-in-flight" };
        }
        running = true;
        try {
            const healthy = await check();
            if (healthy) {
                logger.info("OK!");
                return { status: "healthy" };
            }
            logger.error("Health check failed: check reported unhealthy");
            return { status: "unhealthy", reason: "check reported unhealthy" };
        } catch (err) {
            const message = err instanceof Error ? err.message : String(err);
            logger.errorf("Health check failed: %s", message);
            return { status: "unhealthy", reason: message };
        } finally {
            running = false;
        }
    };

    timer = setInterval(() => {
        void runOnce();
    }, intervalMs);
    // 不阻止进程退出
    timer.unref();

    return {
        stop: () => {
            if (timer) {
                clearInterval(timer);
                timer = null;
            }
        },
        runOnce,
    };
}
