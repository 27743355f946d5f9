import { WriteStream, createWriteStream, existsSync } from "fs";
import { mkdir } from "fs/promises";
import { dirname } from "path";
import { format } from "util";

/**
 * 日志级别：数值越大输出越详细
 * 0 静默，1 错误，2 警告，3 信息，4 调试
 */
export type Verbosity = 0 | 1 | 2 | 3 | 4;

type Level = "ERROR" | "WARN" | "INFO" | "DEBUG";

const LEVEL_THRESHOLD: Record<Level, Verbosity> = {
  ERROR: 1,
  WARN: 2,
  INFO: 3,
  DEBUG: 4,
};

/**
 * 日志写入器
 * 输出到终端，初始化文件后同时追加写入日志文件
 */
export class Logger {
  private logStream: WriteStream | null = null;
  private logFilePath: string | null = null;
  private verbosity: Verbosity = 3;

  /**
   * 初始化日志文件
   */
  async init(logPath: string) {
    await this.close();

    // 确保日志目录存在
    const logDir = dirname(logPath);
    if (!existsSync(logDir)) {
      await mkdir(logDir, { recursive: true });
    }

    // 创建写入流，追加模式；打开失败时 init 直接 reject
    const stream = createWriteStream(logPath, { flags: "a" });
    await new Promise<void>((resolve, reject) => {
      stream.once("open", () => resolve());
      stream.once("error", reject);
    });

    // 写入出错时停用文件输出，只保留终端输出
    stream.on("error", (error) => {
      if (this.logStream === stream) {
        this.logStream = null;
        this.logFilePath = null;
      }
      console.error(`Failed to write log file ${logPath}: ${error.message}`);
    });

    this.logStream = stream;
    this.logFilePath = logPath;
  }

  setVerbosity(verbosity: Verbosity) {
    this.verbosity = verbosity;
  }

  getVerbosity(): Verbosity {
    return this.verbosity;
  }

  error(...args: unknown[]) {
    this.write("ERROR", args);
  }

  warn(...args: unknown[]) {
    this.write("WARN", args);
  }

  info(...args: unknown[]) {
    this.write("INFO", args);
  }

  debug(...args: unknown[]) {
    this.write("DEBUG", args);
  }

  private write(level: Level, args: unknown[]) {
    if (this.verbosity < LEVEL_THRESHOLD[level]) return;

    switch (level) {
      case "ERROR":
        console.error(...args);
        break;
      case "WARN":
        console.warn(...args);
        break;
      case "INFO":
        console.info(...args);
        break;
      case "DEBUG":
        console.debug(...args);
        break;
    }

    if (this.logStream) {
      this.logStream.write(`[${timestamp()}] [${level}] ${format(...args)}\n`);
    }
  }

  /**
   * 获取日志文件路径
   */
  getLogPath(): string | null {
    return this.logFilePath;
  }

  /**
   * 关闭日志流
   */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;
    this.logFilePath = null;
    if (!stream) return Promise.resolve();
    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }
}

// 格式化时间戳（本地时间，精确到毫秒）
function timestamp(): string {
  const now = new Date();
  const pad = (n: number, width = 2) => String(n).padStart(width, "0");
  return (
    `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())} ` +
    `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}` +
    `.${pad(now.getMilliseconds(), 3)}`
  );
}

// 全局单例
export const logger = new Logger();
