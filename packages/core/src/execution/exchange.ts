/**
 * Exchange runner: one model round trip against a history store.
 *
 * The model receives a private copy of the active sequence taken right
 * after `prepareForResponse()`, followed by this turn's user message. The
 * store does not see that user message until the reply arrives; then both
 * enter the proposal together. Anything the user does to the store while the
 * call is outstanding applies to the store, not to the copy. A failed,
 * aborted or timed-out call appends nothing.
 */

import type { ExchangeRequest, ExchangeResult, IHistoryStore, EventBus } from "@storyloom/sdk";
import {
  ErrorCode,
  HistoryEventType,
  ProviderError,
  assistantMessage,
  userMessage,
} from "@storyloom/sdk";
import { DEFAULT_GUIDANCE, createLogger, type Logger } from "@storyloom/shared";
import { splitReasoning } from "./response.js";

export interface ExchangeDeps {
  bus?: EventBus;
  logger?: Logger;
}

const defaultLogger = createLogger("Exchange");

export async function runExchange<P>(
  store: IHistoryStore,
  request: ExchangeRequest<P>,
  deps: ExchangeDeps = {},
): Promise<ExchangeResult> {
  const logger = deps.logger ?? defaultLogger;
  const bus = deps.bus;

  if (request.signal?.aborted) {
    throw new ProviderError("aborted before sending", { code: ErrorCode.PROVIDER_ABORTED });
  }

  const turn = userMessage(composeGuidance(request.guidance, request));
  store.prepareForResponse();
  const sent = [...store.activeSequence(), turn];

  bus?.emit({
    type: HistoryEventType.EXCHANGE_SENT,
    timestamp: Date.now(),
    payload: { storeId: store.id, messages: sent.length },
  });
  const stop = logger.time("model call");

  let raw: string;
  try {
    raw = await callWithLimits(request.invoke(request.systemPrompt, [...sent], request.params), request);
  } catch (err) {
    const error =
      err instanceof ProviderError
        ? err
        : new ProviderError(err instanceof Error ? err.message : String(err), { cause: err });
    stop();
    logger.error("Model call failed", { code: error.code, error: error.message });
    bus?.emit({
      type: HistoryEventType.EXCHANGE_FAILED,
      timestamp: Date.now(),
      payload: { storeId: store.id, code: error.code },
    });
    throw error;
  }
  stop();

  const warning = store.addMessages([turn, assistantMessage(raw)]);
  const { narrative, reasoning } = splitReasoning(raw);

  bus?.emit({
    type: HistoryEventType.EXCHANGE_RECEIVED,
    timestamp: Date.now(),
    payload: { storeId: store.id, length: raw.length },
  });

  return { raw, narrative, reasoning, sent, warning };
}

/**
 * The text of the user turn. Blank guidance becomes `defaultGuidance`;
 * otherwise it is wrapped in `guidanceTag` when one is given. The tag may be
 * written bare (`instruction`) or as an opening tag (`<instruction kind="x">`);
 * only its name is used.
 */
export function composeGuidance(
  guidance: string,
  options: { defaultGuidance?: string; guidanceTag?: string } = {},
): string {
  if (guidance.trim().length === 0) {
    return options.defaultGuidance ?? DEFAULT_GUIDANCE;
  }
  const tagName = options.guidanceTag?.trim().replace(/^<+|>+$/g, "").split(/\s+/)[0] ?? "";
  return tagName.length > 0 ? `<${tagName}>${guidance}</${tagName}>` : guidance;
}

/** Race the model call against the abort signal and the timeout. */
function callWithLimits<P>(call: Promise<string>, request: ExchangeRequest<P>): Promise<string> {
  const { signal, timeoutMs } = request;
  if (!signal && timeoutMs === undefined) return call;

  return new Promise<string>((resolve, reject) => {
    let timer: ReturnType<typeof setTimeout> | undefined;

    const onAbort = (): void => {
      cleanup();
      reject(new ProviderError("aborted", { code: ErrorCode.PROVIDER_ABORTED, cause: signal?.reason }));
    };

    function cleanup(): void {
      if (timer !== undefined) clearTimeout(timer);
      signal?.removeEventListener("abort", onAbort);
    }

    signal?.addEventListener("abort", onAbort, { once: true });
    if (timeoutMs !== undefined) {
      timer = setTimeout(() => {
        cleanup();
        reject(new ProviderError(`timed out after ${timeoutMs}ms`, { code: ErrorCode.PROVIDER_TIMEOUT }));
      }, timeoutMs);
    }

    call.then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}
