// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

export {
  FakeDecisionEngine,
  type FakeDecisionEngineConfig,
  FakeExecutionSurface,
  FakeProposalSource,
} from "./fake-collaborators.js";
export { MemoryCheckpointStore } from "./memory-checkpoint-store.js";
