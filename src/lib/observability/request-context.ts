import { randomUUID } from "crypto";
import { AsyncLocalStorage } from "async_hooks";

type ContextStore = {
  requestId: string;
  reportId?: string;
};

const storage = new AsyncLocalStorage<ContextStore>();

export function withRequestContext<T>(
  fn: () => Promise<T>,
  requestId?: string,
) {
  return storage.run(
    {
      requestId: requestId ?? randomUUID(),
    },
    fn,
  );
}

/**
 * Scopes log lines emitted inside fn to one report.
 * Keeps the surrounding request id when there is one.
 */
export function withReportContext<T>(
  reportId: string,
  fn: () => Promise<T>,
): Promise<T> {
  const parent = storage.getStore();
  return storage.run(
    {
      requestId: parent?.requestId ?? randomUUID(),
      reportId,
    },
    fn,
  );
}

export function getRequestId(): string | undefined {
  return storage.getStore()?.requestId;
}

export function getReportId(): string | undefined {
  return storage.getStore()?.reportId;
}
