import nock from "nock";
import { afterAll, afterEach, beforeAll } from "vitest";

beforeAll(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  const pending = nock.pendingMocks();
  nock.cleanAll();
  if (pending.length > 0) {
    throw new Error(`HTTP mocks never called: ${pending.join(", ")}`);
  }
});

afterAll(() => {
  nock.enableNetConnect();
});
