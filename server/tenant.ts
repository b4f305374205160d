export type TenantContext = {
  tenantId: string;
  /** Who made the request, from `x-user-id`; recorded on approvals. */
  userId?: string;
};
