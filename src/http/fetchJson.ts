export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly body: string,
    service: string
  ) {
    super(`${service} ${status}: ${body.slice(0, 200)}`);
    this.name = "HttpStatusError";
  }
}

export async function postJson(
  url: string,
  headers: Record<string, string>,
  body: unknown,
  timeoutMs: number,
  service: string
): Promise<unknown> {
  const ctrl = new AbortController();
  const t = setTimeout(() => ctrl.abort(), timeoutMs);

  try {
    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", ...headers },
      body: JSON.stringify(body),
      signal: ctrl.signal
    });

    if (!res.ok) throw new HttpStatusError(res.status, await res.text(), service);
    return await res.json();
  } finally {
    clearTimeout(t);
  }
}
