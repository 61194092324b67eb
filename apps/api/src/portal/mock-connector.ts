import { type Credentials, MOCK_SCHOOL_URL } from "@repo/shared";
import type { PortalConnector, RemoteSession } from "./types.js";

const emptySession: RemoteSession = {
  supportsConcurrentReads: true,
  periods: async () => [],
  lessons: async () => [],
  homework: async () => [],
  close: async () => {},
};

/** Never touches the portal: every login succeeds and every query is empty. */
export class MockPortalConnector implements PortalConnector {
  readonly schoolUrl = MOCK_SCHOOL_URL;

  async login(_credentials: Credentials): Promise<RemoteSession> {
    return emptySession;
  }
}
