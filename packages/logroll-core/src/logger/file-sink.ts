/**
 * logroll Logger - 轮转文件输出
 *
 * 功能：
 * - 追加写入 logs/app.log，同步写入，写完即更新字节计数
 * - 按大小轮转：超过 maxSize 时改名为 app.1.log、app.2.log ...（可选 gzip 为 app.1.log.gz）
 * - 轮转与启动时按 maxBackups / maxAgeDays 清理旧备份
 *
 * 写入与轮转都在同一次同步调用内完成，其它 emit 无法插入到关闭与重新打开之间。
 */

import fs from "node:fs";
import path from "node:path";
import { gzipSync } from "node:zlib";
import { ConfigurationError, WriteError, errorMessage, reportToStderr } from "./errors.js";
import { NO_ROTATION, type ErrorReporter, type LogSink, type RotationPolicy } from "./types.js";

const DAY_MS = 24 * 60 * 60 * 1000;
const DEFAULT_SIZE_BYTES = 10 * 1024 * 1024;

export interface FileSinkOptions {
  /** 轮转过程中的非致命错误（压缩、清理失败） */
  onError?: ErrorReporter;
}

export interface BackupFile {
  path: string;
  index: number;
  compressed: boolean;
}

/** 解析 "10MB"、"1GB" 等为字节数 */
export function parseSizeToBytes(s: string): number {
  const m = s.trim().match(/^(\d+(?:\.\d+)?)\s*(b|kb|mb|gb)?$/i);
  if (!m) return DEFAULT_SIZE_BYTES;
  const n = Number(m[1]);
  const unit = (m[2] ?? "b").toLowerCase();
  const factors: Record<string, number> = { b: 1, kb: 1024, mb: 1024 * 1024, gb: 1024 * 1024 * 1024 };
  return Math.floor(n * (factors[unit] ?? 1));
}

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function writeAll(fd: number, bytes: Buffer): void {
  let offset = 0;
  while (offset < bytes.length) {
    offset += fs.writeSync(fd, bytes, offset, bytes.length - offset);
  }
}

export class RotatingFileSink implements LogSink {
  readonly path: string;
  private readonly policy: RotationPolicy;
  private readonly onError: ErrorReporter;
  private readonly dir: string;
  private readonly stem: string;
  private readonly ext: string;
  private readonly backupPattern: RegExp;
  private fd: number | null;
  private size: number;
  private closed = false;

  private constructor(filePath: string, policy: RotationPolicy, fd: number, size: number, onError: ErrorReporter) {
    this.path = filePath;
    this.policy = policy;
    this.onError = onError;
    this.fd = fd;
    this.size = size;
    this.dir = path.dirname(filePath);
    this.ext = path.extname(filePath);
    this.stem = path.basename(filePath, this.ext);
    this.backupPattern = new RegExp(`^${escapeRegExp(this.stem)}\\.(\\d+)${escapeRegExp(this.ext)}(\\.gz)?$`);
  }

  /**
   * 创建目录并以追加方式打开文件。
   * 目录或文件不可用属于配置错误，直接抛出 ConfigurationError。
   */
  static open(filePath: string, policy: RotationPolicy = NO_ROTATION, options: FileSinkOptions = {}): RotatingFileSink {
    const dir = path.dirname(filePath);
    try {
      fs.mkdirSync(dir, { recursive: true });
    } catch (err) {
      throw new ConfigurationError(`Cannot create log directory ${dir}: ${errorMessage(err)}`, { path: dir, cause: err });
    }

    let fd: number;
    let size: number;
    try {
      fd = fs.openSync(filePath, "a", 0o644);
      size = fs.fstatSync(fd).size;
    } catch (err) {
      throw new ConfigurationError(`Cannot open log file ${filePath}: ${errorMessage(err)}`, { path: filePath, cause: err });
    }

    const sink = new RotatingFileSink(filePath, policy, fd, size, options.onError ?? reportToStderr);
    sink.prune();
    return sink;
  }

  /** 当前文件的字节数 */
  get currentSize(): number {
    return this.size;
  }

  append(chunk: string): void {
    const fd = this.ensureOpen();
    const bytes = Buffer.from(chunk, "utf-8");
    try {
      writeAll(fd, bytes);
    } catch (err) {
      throw new WriteError(this.path, `Failed to write log file ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
    this.size += bytes.length;

    try {
      this.rotateIfNeeded();
    } catch (err) {
      this.onError(err instanceof Error ? err : new WriteError(this.path, errorMessage(err)));
    }
  }

  /** 超过 maxSize 时轮转；maxSize 为 0 时从不轮转 */
  rotateIfNeeded(): boolean {
    if (this.policy.maxSize <= 0 || this.size <= this.policy.maxSize) return false;
    this.rotate();
    return true;
  }

  /** 关闭当前文件、改名为下一个备份、按需压缩与清理，然后在原路径打开新文件 */
  rotate(): void {
    if (this.closed) {
      throw new WriteError(this.path, `Log file ${this.path} is closed`);
    }
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }

    const backupPath = this.nextBackupPath();
    try {
      fs.renameSync(this.path, backupPath);
    } catch (err) {
      this.reopen();
      throw new WriteError(this.path, `Failed to rotate ${this.path} to ${backupPath}: ${errorMessage(err)}`, { cause: err });
    }

    if (this.policy.compress) {
      this.compress(backupPath);
    }
    this.prune();
    this.reopen();
  }

  /** 当前文件的全部备份，最旧的在前 */
  listBackups(): BackupFile[] {
    let names: string[];
    try {
      names = fs.readdirSync(this.dir);
    } catch {
      return [];
    }
    const backups: BackupFile[] = [];
    for (const name of names) {
      const m = this.backupPattern.exec(name);
      if (!m) continue;
      backups.push({ path: path.join(this.dir, name), index: Number(m[1]), compressed: m[2] !== undefined });
    }
    return backups.sort((a, b) => a.index - b.index);
  }

  close(): void {
    this.closed = true;
    if (this.fd !== null) {
      fs.closeSync(this.fd);
      this.fd = null;
    }
  }

  private ensureOpen(): number {
    if (this.closed) {
      throw new WriteError(this.path, `Log file ${this.path} is closed`);
    }
    return this.fd ?? this.reopen();
  }

  private reopen(): number {
    try {
      const fd = fs.openSync(this.path, "a", 0o644);
      this.fd = fd;
      this.size = fs.fstatSync(fd).size;
      return fd;
    } catch (err) {
      throw new WriteError(this.path, `Failed to reopen log file ${this.path}: ${errorMessage(err)}`, { cause: err });
    }
  }

  private nextBackupPath(): string {
    const backups = this.listBackups();
    const next = backups.length > 0 ? backups[backups.length - 1].index + 1 : 1;
    return path.join(this.dir, `${this.stem}.${next}${this.ext}`);
  }

  private compress(backupPath: string): void {
    try {
      fs.writeFileSync(`${backupPath}.gz`, gzipSync(fs.readFileSync(backupPath)));
      fs.unlinkSync(backupPath);
    } catch (err) {
      this.onError(new WriteError(backupPath, `Failed to compress ${backupPath}: ${errorMessage(err)}`, { cause: err }));
    }
  }

  /** 删除超出 maxBackups 的最旧备份，以及早于 maxAgeDays 的备份 */
  private prune(): void {
    const { maxBackups, maxAgeDays } = this.policy;
    if (maxBackups <= 0 && maxAgeDays <= 0) return;

    const backups = this.listBackups();
    const doomed = new Set<string>();
    if (maxBackups > 0 && backups.length > maxBackups) {
      for (const b of backups.slice(0, backups.length - maxBackups)) doomed.add(b.path);
    }
    if (maxAgeDays > 0) {
      const cutoff = Date.now() - maxAgeDays * DAY_MS;
      for (const b of backups) {
        try {
          if (fs.statSync(b.path).mtimeMs < cutoff) doomed.add(b.path);
        } catch (err) {
          this.onError(new WriteError(b.path, `Failed to stat backup ${b.path}: ${errorMessage(err)}`, { cause: err }));
        }
      }
    }

    for (const p of doomed) {
      try {
        fs.unlinkSync(p);
      } catch (err) {
        this.onError(new WriteError(p, `Failed to remove old log ${p}: ${errorMessage(err)}`, { cause: err }));
      }
    }
  }
}
