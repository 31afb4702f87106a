// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

export const ACTIVE_PROPOSALS_QUERY = `
  query ActiveProposals($space: String!, $first: Int!) {
    proposals(
      where: { space: $space, state: "active" }
      first: $first
      orderBy: "created"
      orderDirection: asc
    ) {
      id
      title
      body
      choices
      start
      end
      author
    }
  }
`;

export const VOTER_VOTES_QUERY = `
  query VoterVotes($space: String!, $proposal: String!, $voter: String!) {
    votes(
      where: { space: $space, proposal: $proposal, voter: $voter }
      first: 1
      orderBy: "created"
      orderDirection: desc
    ) {
      id
      choice
    }
  }
`;
