import { QueryClient, type QueryFunction } from "@tanstack/react-query";

function extractErrorMessage(payload: unknown): string {
  if (typeof payload !== "object" || payload === null) {
    return "";
  }
  if ("error" in payload && typeof payload.error === "string") {
    return payload.error;
  }
  if ("message" in payload && typeof payload.message === "string") {
    return payload.message;
  }
  return "";
}

async function throwIfResNotOk(res: Response) {
  if (!res.ok) {
    const text = await res.text();
    let cleanMessage = "";

    // Server errors come back as { error: "message" }
    try {
      cleanMessage = extractErrorMessage(JSON.parse(text));
    } catch (e) {
      if (e instanceof SyntaxError) {
        cleanMessage = text || res.statusText;
      } else {
        throw e;
      }
    }

    throw new Error(cleanMessage || res.statusText || "Request failed");
  }
}

export async function apiRequest(
  method: string,
  url: string,
  data?: unknown,
): Promise<Response> {
  const res = await fetch(url, {
    method,
    headers: data ? { "Content-Type": "application/json" } : {},
    body: data ? JSON.stringify(data) : undefined,
    credentials: "include",
  });

  await throwIfResNotOk(res);
  return res;
}

export async function apiJson<T>(method: string, url: string, data?: unknown): Promise<T> {
  const res = await apiRequest(method, url, data);
  return res.json();
}

/**
 * Query keys are URL segments; a trailing object becomes the query string.
 */
export function buildQueryUrl(queryKey: readonly unknown[]): string {
  const segments: string[] = [];
  const params = new URLSearchParams();

  for (const part of queryKey) {
    if (typeof part === "string" || typeof part === "number") {
      segments.push(String(part));
    } else if (typeof part === "object" && part !== null) {
      for (const [key, value] of Object.entries(part)) {
        if (value !== undefined && value !== null) params.set(key, String(value));
      }
    }
  }

  const query = params.toString();
  return query ? `${segments.join("/")}?${query}` : segments.join("/");
}

export const defaultQueryFn: QueryFunction = async ({ queryKey }) => {
  const res = await fetch(buildQueryUrl(queryKey), { credentials: "include" });
  await throwIfResNotOk(res);
  return await res.json();
};

export const queryClient = new QueryClient({
  defaultOptions: {
    queries: {
      queryFn: defaultQueryFn,
      refetchInterval: false,
      refetchOnWindowFocus: false,
      staleTime: 60000,
      retry: false,
    },
    mutations: {
      retry: false,
    },
  },
});
