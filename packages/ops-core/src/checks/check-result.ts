export interface CheckResult {
  ok: boolean;
  detail: string;
}

export function pass(detail: string): CheckResult {
  return { ok: true, detail };
}

export function fail(detail: string): CheckResult {
  return { ok: false, detail };
}
