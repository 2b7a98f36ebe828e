type HttpMethod = "get" | "post";

interface RouteDoc {
  method: HttpMethod;
  path: string;
  summary: string;
  responses: Record<string, string>;
}

const MUTATION_ERRORS = {
  "400": "Invalid request",
  "403": "Caller not authorized or party blacklisted",
};

const ROUTES: RouteDoc[] = [
  { method: "get", path: "/health", summary: "Health check", responses: { "200": "Service healthy" } },
  {
    method: "post",
    path: "/registry/members",
    summary: "Register a member",
    responses: { "201": "Member registered", ...MUTATION_ERRORS, "409": "Member exists" },
  },
  {
    method: "get",
    path: "/registry/members/{memberId}",
    summary: "Get a member",
    responses: { "200": "Member found", "404": "Member not found" },
  },
  {
    method: "post",
    path: "/registry/members/{memberId}/status",
    summary: "Change member status",
    responses: { "200": "Status changed", ...MUTATION_ERRORS, "404": "Member not found" },
  },
  {
    method: "post",
    path: "/registry/principals",
    summary: "Replace the roles of an address and link it to a member",
    responses: { "200": "Roles assigned", ...MUTATION_ERRORS, "404": "Member not found" },
  },
  {
    method: "get",
    path: "/registry/principals/{address}",
    summary: "Get roles, member link and blacklist flag of an address",
    responses: { "200": "Principal found", "404": "Principal not found" },
  },
  {
    method: "post",
    path: "/registry/blacklist",
    summary: "Add or remove an address from the blacklist",
    responses: { "200": "Blacklist updated", ...MUTATION_ERRORS },
  },
  {
    method: "post",
    path: "/accounts",
    summary: "Open a gold account for an active member",
    responses: { "201": "Account created", ...MUTATION_ERRORS },
  },
  {
    method: "get",
    path: "/accounts",
    summary: "List accounts by memberId or address",
    responses: { "200": "Accounts listed", "400": "Missing filter" },
  },
  {
    method: "get",
    path: "/accounts/{accountId}",
    summary: "Get an account",
    responses: { "200": "Account found", "404": "Account not found" },
  },
  {
    method: "get",
    path: "/accounts/{accountId}/balance",
    summary: "Get an account balance",
    responses: { "200": "Balance", "404": "Account not found" },
  },
  {
    method: "post",
    path: "/accounts/{accountId}/balance",
    summary: "Operator balance correction",
    responses: {
      "200": "Balance updated",
      ...MUTATION_ERRORS,
      "404": "Account not found",
      "409": "Insufficient balance",
    },
  },
  {
    method: "get",
    path: "/ledger/updaters",
    summary: "List enabled balance updaters",
    responses: { "200": "Updaters listed" },
  },
  {
    method: "post",
    path: "/ledger/updaters",
    summary: "Enable or revoke a balance updater",
    responses: { "200": "Allowlist updated", ...MUTATION_ERRORS },
  },
  {
    method: "post",
    path: "/assets/mint",
    summary: "Mint a gold bar token and credit its account",
    responses: {
      "201": "Token minted",
      ...MUTATION_ERRORS,
      "404": "Account not found",
      "409": "Warrant already used",
    },
  },
  {
    method: "get",
    path: "/assets",
    summary: "List tokens by owner or status",
    responses: { "200": "Tokens listed", "400": "Invalid status" },
  },
  {
    method: "post",
    path: "/assets/custody",
    summary: "Hand a batch of tokens to a new custodian",
    responses: { "200": "Custody changed", ...MUTATION_ERRORS, "404": "Token not found", "409": "Token burned" },
  },
  {
    method: "get",
    path: "/assets/{tokenId}",
    summary: "Get a token",
    responses: { "200": "Token found", "404": "Token not found" },
  },
  {
    method: "get",
    path: "/assets/{tokenId}/locked",
    summary: "Whether a token is IN_TRANSIT or PLEDGED",
    responses: { "200": "Lock state", "404": "Token not found" },
  },
  {
    method: "post",
    path: "/assets/{tokenId}/status",
    summary: "Change token status",
    responses: { "200": "Status changed", ...MUTATION_ERRORS, "404": "Token not found", "409": "Invalid status" },
  },
  {
    method: "post",
    path: "/assets/{tokenId}/burn",
    summary: "Burn a token and debit its mint account",
    responses: { "200": "Token burned", ...MUTATION_ERRORS, "404": "Token not found", "409": "Already burned" },
  },
  {
    method: "post",
    path: "/assets/{tokenId}/transfer",
    summary: "Owner transfer",
    responses: { "200": "Ownership moved", ...MUTATION_ERRORS, "404": "Token not found", "409": "Token locked" },
  },
  {
    method: "post",
    path: "/assets/{tokenId}/force-transfer",
    summary: "Platform transfer that overrides compliance holds",
    responses: { "200": "Ownership moved", ...MUTATION_ERRORS, "404": "Token not found", "409": "Token locked" },
  },
  {
    method: "post",
    path: "/assets/{tokenId}/verify-certificate",
    summary: "Compare a certificate hash with the stored one",
    responses: { "200": "Verification result", "404": "Token not found" },
  },
  {
    method: "post",
    path: "/orders/prepare",
    summary: "Prepare a settlement order",
    responses: { "201": "Order prepared", ...MUTATION_ERRORS, "404": "Account or token not found", "409": "Order exists" },
  },
  {
    method: "get",
    path: "/orders",
    summary: "List orders, optionally by status",
    responses: { "200": "Orders listed", "400": "Invalid status" },
  },
  {
    method: "get",
    path: "/orders/{txRef}",
    summary: "Get an order",
    responses: { "200": "Order found", "404": "Order not found" },
  },
  {
    method: "post",
    path: "/orders/{txRef}/sign",
    summary: "Counterparty signature",
    responses: { "200": "Order signed", ...MUTATION_ERRORS, "404": "Order not found", "409": "Invalid order state" },
  },
  {
    method: "post",
    path: "/orders/{txRef}/execute",
    summary: "Execute a signed order",
    responses: { "200": "Order executed", ...MUTATION_ERRORS, "404": "Order not found", "409": "Invalid order state" },
  },
  {
    method: "post",
    path: "/orders/{txRef}/cancel",
    summary: "Cancel a pending order",
    responses: { "200": "Order cancelled", ...MUTATION_ERRORS, "404": "Order not found", "409": "Invalid order state" },
  },
  {
    method: "get",
    path: "/settlement/options",
    summary: "Current execution options",
    responses: { "200": "Options" },
  },
  {
    method: "post",
    path: "/settlement/options",
    summary: "Set execution options",
    responses: { "200": "Options updated", ...MUTATION_ERRORS },
  },
  {
    method: "get",
    path: "/events",
    summary: "Audit events by ref and type",
    responses: { "200": "Events listed", "400": "Invalid filter" },
  },
  {
    method: "get",
    path: "/events/verify",
    summary: "Recompute the audit hash chain",
    responses: { "200": "Chain verification result" },
  },
];

function pathParameters(path: string) {
  return [...path.matchAll(/\{(\w+)\}/g)].map((match) => ({
    in: "path",
    name: match[1],
    required: true,
    schema: { type: "string" },
  }));
}

export function buildOpenApiSpec(serviceBaseUrl: string) {
  const paths: Record<string, Record<string, unknown>> = {};
  for (const route of ROUTES) {
    const parameters = pathParameters(route.path);
    const responses = Object.fromEntries(
      Object.entries(route.responses).map(([status, description]) => [status, { description }]),
    );
    paths[route.path] = {
      ...paths[route.path],
      [route.method]: {
        summary: route.summary,
        ...(parameters.length > 0 ? { parameters } : {}),
        responses,
      },
    };
  }

  return {
    openapi: "3.0.3",
    info: {
      title: "Bullion Custody Service API",
      version: "0.1.0",
      description: "Gold bar custody, account ledger and bilateral order settlement.",
    },
    servers: [{ url: serviceBaseUrl }],
    paths,
  };
}
