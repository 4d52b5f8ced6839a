import fs from "fs/promises";
import os from "os";
import path from "path";
import { AddressInfo } from "net";
import { Server } from "http";
import { AppContainer, buildContainer } from "../../src/container";
import { createApp } from "../../src/app";
import { loadSettings } from "../../src/config/settings";
import { CredentialService } from "../../src/services/credentialService";
import { Actor } from "../../src/services/auditRecorder";
import { FileStorage } from "../../src/utils/fileStorage";
import { Clock } from "../../src/utils/time";
import { PublicUser, UserRole, toPublicUser } from "../../src/types/domain";
import { InMemoryDatabase } from "./inMemoryDatabase";

export const TEST_NOW = new Date("2024-03-01T10:00:00Z");

// A clock that only moves when told to.
export class FixedClock implements Clock {
  constructor(private current: Date = TEST_NOW) {}

  now(): Date {
    return new Date(this.current.getTime());
  }

  set(instant: Date): void {
    this.current = new Date(instant.getTime());
  }

  advanceMinutes(minutes: number): void {
    this.current = new Date(this.current.getTime() + minutes * 60000);
  }
}

export interface Harness {
  db: InMemoryDatabase;
  clock: FixedClock;
  storage: FileStorage;
  container: AppContainer;
  healthy: { db: boolean };
  cleanup(): Promise<void>;
}

export async function createHarness(): Promise<Harness> {
  const storageRoot = await fs.mkdtemp(path.join(os.tmpdir(), "medimg-test-"));
  const settings = loadSettings({ JWT_SECRET: "test-secret", STORAGE_ROOT: storageRoot });
  const clock = new FixedClock();
  const db = new InMemoryDatabase(clock);
  const storage = new FileStorage(storageRoot);
  await storage.init();
  const healthy = { db: true };

  const container = buildContainer({
    settings,
    repositories: db.repositories(),
    transactions: db.transactions,
    storage,
    healthProbe: { ping: async () => healthy.db },
    clock,
    credentials: new CredentialService(settings, 4)
  });

  return {
    db,
    clock,
    storage,
    container,
    healthy,
    cleanup: () => fs.rm(storageRoot, { recursive: true, force: true })
  };
}

export async function seedUser(harness: Harness, username: string, role: UserRole, password = "password123"): Promise<PublicUser> {
  const passwordHash = await harness.container.credentials.hashPassword(password);
  const user = await harness.container.repositories.users.create({ username, passwordHash, role });
  return toPublicUser(user);
}

export function actorOf(user: PublicUser, ip: string | null = "10.0.0.1"): Actor {
  return { user, ip };
}

export function tokenFor(harness: Harness, user: PublicUser): string {
  return harness.container.credentials.issueToken(user);
}

export interface RunningApi {
  baseUrl: string;
  close(): Promise<void>;
}

// Serves the app on an ephemeral local port for fetch-based tests.
export async function startApi(harness: Harness): Promise<RunningApi> {
  const app = createApp(harness.container);
  const server: Server = await new Promise((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  const address: AddressInfo | string | null = server.address();
  if (!address || typeof address === "string") {
    throw new Error("Test server has no TCP address");
  }
  return {
    baseUrl: `http://127.0.0.1:${address.port}`,
    close: () => new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      // fetch keeps connections alive; drop them so close resolves promptly.
      server.closeAllConnections();
    })
  };
}
