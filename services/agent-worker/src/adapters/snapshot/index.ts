// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

export { SnapshotGraphqlClient, type SnapshotGraphqlConfig } from "./graphql.js";
export {
  SnapshotExecutionSurface,
  type SnapshotExecutionSurfaceConfig,
} from "./snapshot-execution-surface.js";
export { SnapshotProposalSource } from "./snapshot-proposal-source.js";
export {
  isVotable,
  SNAPSHOT_DOMAIN,
  type SignedVote,
  signVote,
  VOTE_CHOICES,
  VOTE_TYPES_BYTES32_PROPOSAL,
  VOTE_TYPES_STRING_PROPOSAL,
  verdictForChoice,
} from "./vote-typed-data.js";
