/**
 * Orchestrator ports.
 * Purpose: narrow interfaces the build engine talks to instead of concrete adapters.
 * Assumptions: every port is replaceable by an in-memory fake in tests.
 */

import type { EventLogger } from "../../core/logger.js";
import type { DescriptorStore } from "../../descriptors/store.js";
import type { ImageBuilder } from "../../docker/image-builder.js";
import type { RevisionLookup } from "../../git/remote.js";

export type Clock = {
  now(): Date;
};

export type SourceRevisionResolver = {
  lookup: RevisionLookup;
};

export type LogSink = {
  createRunLogger(runId: string): EventLogger;
};

export type OrchestratorPorts = {
  descriptorStore: DescriptorStore;
  imageBuilder: ImageBuilder;
  sourceRevisions: SourceRevisionResolver;
  logSink: LogSink;
  clock: Clock;
};
