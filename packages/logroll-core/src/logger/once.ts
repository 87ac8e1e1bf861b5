/**
 * 只初始化一次的惰性单元格。
 *
 * 第一次 get() 启动初始化，之后（无论并发还是更晚）的调用都拿到同一个结果，
 * 包括初始化失败时的同一个错误。
 */
export class Once<T> {
  private promise?: Promise<T>;
  private settled?: { ok: true; value: T } | { ok: false; error: unknown };

  get(init: () => T | Promise<T>): Promise<T> {
    if (!this.promise) {
      this.promise = new Promise<T>((resolve) => resolve(init())).then(
        (value) => {
          this.settled = { ok: true, value };
          return value;
        },
        (error: unknown) => {
          this.settled = { ok: false, error };
          throw error;
        },
      );
    }
    return this.promise;
  }

  /** 已成功完成时返回值，否则 undefined */
  peek(): T | undefined {
    const settled = this.settled;
    return settled?.ok ? settled.value : undefined;
  }

  get started(): boolean {
    return this.promise !== undefined;
  }
}
