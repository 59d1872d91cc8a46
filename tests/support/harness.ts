import { loadConfig } from "@config/env.ts";
import { createServices } from "@/container.ts";
import type { ContainerOverrides, ServiceContainer } from "@/container.ts";
import type { DecodedDocument } from "@models/document.ts";
import { JobWorker } from "@services/worker_service.ts";
import { FakeDecoder, FakeEngine, immediate } from "./fakes.ts";
import { MemoryResultStore } from "./memory_store.ts";

export const FIXED_NOW = Date.UTC(2024, 0, 15, 12, 0, 15);

export interface Harness {
  store: MemoryResultStore;
  engine: FakeEngine;
  decoder: FakeDecoder;
  services: ServiceContainer;
  worker(): JobWorker;
}

export interface HarnessOptions {
  env?: Record<string, string>;
  document?: (data: Uint8Array) => DecodedDocument;
  engineDelayMs?: number;
  overrides?: ContainerOverrides;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const store = new MemoryResultStore();
  const engine = new FakeEngine(options.engineDelayMs ?? 0);
  const decoder = new FakeDecoder(options.document ?? (() => {
    throw new Error("no document configured");
  }));

  const config = loadConfig({ ENVIRONMENT: "test", LOG_LEVEL: "SILENT", ...options.env });
  const services = createServices(store, { decoder, engine }, config, {
    sleep: immediate,
    now: () => FIXED_NOW,
    ...options.overrides,
  });

  return {
    store,
    engine,
    decoder,
    services,
    worker: () => new JobWorker(services.queue, services.processor, { idlePollMs: 1, errorBackoffMs: 1 }, immediate),
  };
}

export const bytes = (text: string): Uint8Array => new TextEncoder().encode(text);
