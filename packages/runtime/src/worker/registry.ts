/**
 * Реестр запущенных воркеров по токену. Единственное общее изменяемое состояние
 * супервизора; доступ только через register/deregister/lookup.
 */
export class WorkerRegistry<THandle> {
  private readonly entries = new Map<string, THandle>();

  /** false, если под этим токеном уже кто-то зарегистрирован */
  register(token: string, handle: THandle): boolean {
    if (this.entries.has(token)) {
      return false;
    }
    this.entries.set(token, handle);
    return true;
  }

  /**
   * Удаляет запись. С `handle` удаляет только если запись принадлежит ему:
   * завершившийся старый воркер не снимет с учёта уже перезапущенный.
   */
  deregister(token: string, handle?: THandle): boolean {
    const current = this.entries.get(token);
    if (current === undefined) {
      return false;
    }
    if (handle !== undefined && current !== handle) {
      return false;
    }
    this.entries.delete(token);
    return true;
  }

  lookup(token: string): THandle | undefined {
    return this.entries.get(token);
  }

  list(): THandle[] {
    return [...this.entries.values()];
  }

  get size(): number {
    return this.entries.size;
  }
}
