import type { Request, Response, NextFunction } from "express";
import { getRuntime } from "../runtime";
import type { TenantContext } from "../tenant";

declare global {
  namespace Express {
    interface Request {
      tenantContext: TenantContext;
    }
  }
}

function headerValue(req: Request, name: string): string | undefined {
  const value = req.headers[name];
  return typeof value === "string" && value !== "" ? value : undefined;
}

/**
 * Resolves the x-tenant-id header (slug) to a tenant id.
 *
 * Storage rows reference tenants.id, never the slug, so everything
 * downstream of this middleware receives the id.
 */
export async function tenantResolution(req: Request, res: Response, next: NextFunction) {
  const slug = headerValue(req, "x-tenant-id");
  if (!slug) {
    return res.status(401).json({ message: "Missing tenant context" });
  }

  try {
    const tenant = await getRuntime().storage.getTenantBySlug(slug);
    if (!tenant) {
      return res.status(404).json({ message: `Tenant "${slug}" not found` });
    }

    req.tenantContext = {
      tenantId: tenant.id,
      userId: headerValue(req, "x-user-id"),
    };
    next();
  } catch (err) {
    next(err);
  }
}
