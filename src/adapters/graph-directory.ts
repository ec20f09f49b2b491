/**
 * Microsoft Graph directory adapter.
 * Purpose: enumerate users (with assigned SKUs) and the tenant's SKU catalog.
 * Assumptions: a bearer token with User.Read.All / Organization.Read.All is supplied.
 * Usage: const directory = new GraphDirectorySource({ baseUrl, token, pageSize: 999 });
 */

import { z } from "zod";

import type { DirectorySource, PreconditionCheck } from "../app/sweep/ports.js";
import { DirectoryError, PreconditionError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import type { Subject } from "../core/model.js";

// =============================================================================
// RESPONSE SCHEMAS
// =============================================================================

const GraphUserSchema = z.object({
  userPrincipalName: z.string().min(1),
  displayName: z.string().nullable().optional(),
  accountEnabled: z.boolean().nullable().optional(),
  assignedLicenses: z
    .array(z.object({ skuId: z.string().min(1) }).passthrough())
    .default([]),
});

const GraphUsersPageSchema = z.object({
  value: z.array(GraphUserSchema),
  "@odata.nextLink": z.string().url().optional(),
});

const GraphSkusSchema = z.object({
  value: z.array(
    z.object({
      skuId: z.string().min(1),
      skuPartNumber: z.string().min(1),
    }).passthrough(),
  ),
});

type GraphUser = z.infer<typeof GraphUserSchema>;

// =============================================================================
// TYPES
// =============================================================================

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type GraphDirectoryOptions = {
  baseUrl: string;
  token: string | undefined;
  pageSize?: number;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
};

const USER_FIELDS = ["userPrincipalName", "displayName", "accountEnabled", "assignedLicenses"];

// =============================================================================
// ADAPTER
// =============================================================================

export class GraphDirectorySource implements DirectorySource {
  private readonly fetchImpl: FetchLike;
  private readonly baseUrl: string;
  private catalog: Record<string, string> | null = null;

  constructor(private readonly options: GraphDirectoryOptions) {
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
  }

  async listLicenseCatalog(): Promise<Record<string, string>> {
    if (this.catalog) return this.catalog;

    const body = await this.getJson(`${this.baseUrl}/subscribedSkus`);
    const parsed = GraphSkusSchema.safeParse(body);
    if (!parsed.success) {
      throw new DirectoryError("Unexpected /subscribedSkus response shape.", parsed.error);
    }

    this.catalog = Object.fromEntries(
      parsed.data.value.map((sku) => [sku.skuId, sku.skuPartNumber]),
    );
    return this.catalog;
  }

  async listSubjects(filter?: string): Promise<Subject[]> {
    const catalog = await this.listLicenseCatalog();
    const subjects: Subject[] = [];
    let nextUrl: string | undefined = this.buildUsersUrl(filter);

    while (nextUrl) {
      const body = await this.getJson(nextUrl);
      const parsed = GraphUsersPageSchema.safeParse(body);
      if (!parsed.success) {
        throw new DirectoryError("Unexpected /users response shape.", parsed.error);
      }

      for (const user of parsed.data.value) {
        subjects.push(toSubject(user, catalog));
      }
      nextUrl = parsed.data["@odata.nextLink"];
    }

    return subjects;
  }

  /** Precondition: token present and the organization endpoint answers. */
  preconditionCheck(): PreconditionCheck {
    return {
      name: "directory",
      verify: async () => {
        if (!this.options.token) {
          throw new PreconditionError("No directory access token is configured.", "directory");
        }
        try {
          await this.getJson(`${this.baseUrl}/organization?$select=id`);
        } catch (error) {
          throw new PreconditionError(
            `Directory is unreachable: ${formatErrorMessage(error)}`,
            "directory",
            error,
          );
        }
      },
    };
  }

  // ---------------------------------------------------------------------------

  buildUsersUrl(filter?: string): string {
    const params = new URLSearchParams();
    params.set("$select", USER_FIELDS.join(","));
    params.set("$top", String(this.options.pageSize ?? 999));
    if (filter) {
      params.set("$filter", `startswith(userPrincipalName,'${filter.replace(/'/g, "''")}')`);
    }
    return `${this.baseUrl}/users?${params.toString()}`;
  }

  private async getJson(url: string): Promise<unknown> {
    const response = await this.fetchImpl(url, {
      method: "GET",
      headers: {
        Authorization: `Bearer ${this.options.token ?? ""}`,
        Accept: "application/json",
      },
      signal: AbortSignal.timeout(this.options.timeoutMs ?? 30000),
    });

    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new DirectoryError(
        `Graph request failed (${response.status} ${response.statusText}) for ${url}${detail ? `: ${detail}` : ""}`,
      );
    }

    return response.json();
  }
}

function toSubject(user: GraphUser, catalog: Record<string, string>): Subject {
  return {
    id: user.userPrincipalName,
    label: user.displayName ?? user.userPrincipalName,
    enabled: user.accountEnabled ?? false,
    skus: user.assignedLicenses.map((license) => catalog[license.skuId] ?? license.skuId),
  };
}
