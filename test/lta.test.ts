import assert from "node:assert/strict";
import { describe, it } from "node:test";

import { ConcurrencyLimiter } from "../src/concurrency.js";
import { DownloadCancelledError, LTAError, ServerError } from "../src/errors.js";
import { HubClient } from "../src/hub-client.js";
import { silentLogger } from "../src/logger.js";
import {
  StatusRecorder,
  triggerAndWait,
  TriggerContext,
  triggerOfflineRetrieval,
} from "../src/lta.js";
import { DownloadStatus } from "../src/utils.js";
import {
  API_URL,
  FakeHub,
  FakeProductInit,
  TEST_PASSWORD,
  TEST_USER,
} from "./helpers/fake-hub.js";

function context(client: HubClient): TriggerContext {
  return {
    api: client,
    limiter: new ConcurrencyLimiter({ transfer: 2, trigger: 1 }),
    logger: silentLogger,
  };
}

function offlineHub(init: Partial<FakeProductInit> = {}) {
  return new FakeHub([{ id: "p1", title: "S2A_T", online: false, ...init }]);
}

class RecordingStatuses implements StatusRecorder {
  readonly history: DownloadStatus[] = [];
  private current: DownloadStatus;

  constructor(initial: DownloadStatus) {
    this.current = initial;
  }

  get(): DownloadStatus {
    return this.current;
  }

  set(_id: string, status: DownloadStatus): void {
    this.current = status;
    this.history.push(status);
  }
}

describe("triggerOfflineRetrieval", () => {
  it("reports online products", async () => {
    const hub = new FakeHub([{ id: "p1", title: "S2A_T" }]);
    assert.strictEqual(await triggerOfflineRetrieval("p1", context(hub.client())), false);
    assert.deepStrictEqual(
      hub.transferRequests("p1").map((request) => request.range),
      ["bytes=0-1"]
    );
  });

  it("accepts retrieval of offline products", async () => {
    const hub = offlineHub();
    assert.strictEqual(await triggerOfflineRetrieval("p1", context(hub.client())), true);
  });

  it("treats the concurrent flows limit as online", async () => {
    const hub = offlineHub({
      triggerStatus: 403,
      causeMessage: "An exception occured while creating a stream: Maximum number of 4 concurrent flows achieved by the user",
    });
    assert.strictEqual(await triggerOfflineRetrieval("p1", context(hub.client())), false);
  });

  it("raises a quota error", async () => {
    const hub = offlineHub({ triggerStatus: 403, causeMessage: "Offline products quota exceeded" });
    await assert.rejects(triggerOfflineRetrieval("p1", context(hub.client())), (error: unknown) => {
      assert.ok(error instanceof LTAError);
      assert.strictEqual(error.reason, "quota");
      assert.strictEqual(error.msg, "User quota exceeded: Offline products quota exceeded");
      assert.strictEqual(error.response?.status, 403);
      return true;
    });
  });

  it("raises a retryable error when the archive refuses", async () => {
    const hub = offlineHub({ triggerStatus: 503, causeMessage: "Archive busy" });
    await assert.rejects(triggerOfflineRetrieval("p1", context(hub.client())), (error: unknown) => {
      assert.ok(error instanceof LTAError);
      assert.strictEqual(error.retryable, true);
      assert.strictEqual(error.msg, "Request not accepted: Archive busy");
      return true;
    });
  });

  it("raises a server error for other successful statuses", async () => {
    const hub = offlineHub({ triggerStatus: 204 });
    await assert.rejects(triggerOfflineRetrieval("p1", context(hub.client())), ServerError);
  });
});

describe("triggerAndWait", () => {
  it("triggers once and polls until the product is online", async () => {
    const hub = offlineHub({ pollsUntilOnline: 2 });
    const statuses = new RecordingStatuses(DownloadStatus.OFFLINE);

    await triggerAndWait("p1", context(hub.client()), { statuses, retryDelayMs: 0 });

    assert.deepStrictEqual(statuses.history, [DownloadStatus.TRIGGERED, DownloadStatus.ONLINE]);
    assert.strictEqual(hub.transferRequests("p1").length, 1);
  });

  it("returns at once for products that are online", async () => {
    const hub = new FakeHub([{ id: "p1", title: "S2A_T" }]);
    const statuses = new RecordingStatuses(DownloadStatus.OFFLINE);

    await triggerAndWait("p1", context(hub.client()), { statuses, retryDelayMs: 0 });

    assert.deepStrictEqual(statuses.history, [DownloadStatus.ONLINE]);
    assert.strictEqual(hub.transferRequests("p1").length, 0);
  });

  it("retries when the archive is busy", async () => {
    const hub = offlineHub();
    let refused = 0;
    const client = new HubClient(
      { apiUrl: API_URL, user: TEST_USER, password: TEST_PASSWORD },
      {
        logger: silentLogger,
        fetch: async (input, init) => {
          if (input.endsWith(")/$value") && refused < 2) {
            refused += 1;
            return new Response(null, { status: 503, headers: { "cause-message": "Archive busy" } });
          }
          return hub.fetch(input, init);
        },
      }
    );
    const statuses = new RecordingStatuses(DownloadStatus.OFFLINE);

    await triggerAndWait("p1", context(client), { statuses, retryDelayMs: 0 });

    assert.strictEqual(refused, 2);
    assert.deepStrictEqual(statuses.history, [DownloadStatus.TRIGGERED, DownloadStatus.ONLINE]);
  });

  it("gives up on an exhausted quota", async () => {
    const hub = offlineHub({ triggerStatus: 403, causeMessage: "quota" });
    const statuses = new RecordingStatuses(DownloadStatus.OFFLINE);

    await assert.rejects(
      triggerAndWait("p1", context(hub.client()), { statuses, retryDelayMs: 0 }),
      { name: "LTAError", reason: "quota" }
    );
  });

  it("times out when the product stays offline", async () => {
    const hub = offlineHub({ pollsUntilOnline: 1_000 });
    const statuses = new RecordingStatuses(DownloadStatus.OFFLINE);
    let clock = -1_000;
    const now = () => (clock += 1_000);

    await assert.rejects(
      triggerAndWait("p1", context(hub.client()), {
        statuses,
        retryDelayMs: 0,
        timeoutMs: 2_000,
        now,
      }),
      (error: unknown) => {
        assert.ok(error instanceof LTAError);
        assert.strictEqual(error.reason, "timeout");
        assert.strictEqual(error.msg, "Product p1 did not come online within 2 seconds");
        return true;
      }
    );
    assert.deepStrictEqual(statuses.history, [DownloadStatus.TRIGGERED]);
  });

  it("stops when cancelled", async () => {
    const hub = offlineHub();
    const statuses = new RecordingStatuses(DownloadStatus.OFFLINE);

    await assert.rejects(
      triggerAndWait("p1", context(hub.client()), {
        statuses,
        retryDelayMs: 0,
        signal: AbortSignal.abort(),
      }),
      DownloadCancelledError
    );
    assert.strictEqual(hub.requests.length, 0);
  });
});
