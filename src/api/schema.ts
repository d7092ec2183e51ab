export const typeDefs = /* GraphQL */ `
  enum DisbursementStatus {
    QUEUED
    SUBMITTED
    CONFIRMED
    FAILED
    ABANDONED
  }

  enum DisbursementOutcomeKind {
    CONFIRMED
    FAILED
    ABANDONED
    PENDING
    RATE_LIMITED
    INVALID_ADDRESS
    UNAVAILABLE
  }

  type SubmissionAttempt {
    attempt: Int!
    sequence: Int!
    txHash: String
    fee: String
    submittedAt: String!
    error: String
  }

  type Disbursement {
    id: ID!
    requesterId: String!
    destination: String!
    amount: String!
    status: DisbursementStatus!
    sequence: Int
    txHash: String
    failureReason: String
    attemptCount: Int!
    createdAt: String!
    updatedAt: String!
    settledAt: String
    attempts: [SubmissionAttempt!]!
  }

  type DisbursementEdge {
    cursor: String!
    node: Disbursement!
  }

  type DisbursementConnection {
    edges: [DisbursementEdge!]!
    pageInfo: PageInfo!
  }

  type PageInfo {
    endCursor: String
    hasNextPage: Boolean!
  }

  type DisbursementResult {
    outcome: DisbursementOutcomeKind!
    disbursementId: ID
    txHash: String
    sequence: Int
    reason: String
    cause: String
    retryAfterMs: Int
  }

  type Health {
    healthy: Boolean!
    reachableChain: Boolean!
    fundingBalanceAboveThreshold: Boolean!
    fundingBalance: String
    fundingAddress: String
    queueDepth: Int!
    fatalError: String
  }

  type Query {
    health: Health!
    disbursement(id: ID!): Disbursement
    disbursements(status: DisbursementStatus, first: Int!, after: String): DisbursementConnection!
  }

  type Mutation {
    "Requires the gateway key header; the gateway vouches for requesterId."
    requestDisbursement(requesterId: String!, destination: String!): DisbursementResult!
  }
`;
