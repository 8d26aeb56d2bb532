import type { OrganizationPlan, RoleSpec, SiteAllocation, VariableValue } from "@shared/schema";
import { AddressFormatError, AllocationConflictError, AllocationExhaustedError } from "../errors";

/**
 * Deterministic IPv4 address planning.
 *
 * Root block → `zoneCount` equal zones (pure prefix split) → one
 * power-of-two site block per ordinal → role subnets laid out in role-table
 * order, each aligned to its own size. Every block produced here is either
 * disjoint from or nested inside any other block produced from the same
 * plan. No I/O: callers persist the output.
 */

const IPV4_SPACE = 2 ** 32;

export type AddressBlock = Readonly<{
  network: number;
  prefixLength: number;
}>;

export type PlannedSubnet = Readonly<{
  role: string;
  block: AddressBlock;
  vlanId: number;
}>;

export type SitePlan = Readonly<{
  zoneIndex: number;
  ordinal: number;
  zoneBlock: AddressBlock;
  siteBlock: AddressBlock;
  subnets: readonly PlannedSubnet[];
}>;

export function blockSize(prefixLength: number): number {
  return 2 ** (32 - prefixLength);
}

export function lastAddress(block: AddressBlock): number {
  return block.network + blockSize(block.prefixLength) - 1;
}

export function parseCidr(cidr: string): AddressBlock {
  const match = /^(\d{1,3})\.(\d{1,3})\.(\d{1,3})\.(\d{1,3})\/(\d{1,2})$/.exec(cidr.trim());
  if (!match) {
    throw new AddressFormatError(`"${cidr}" is not an IPv4 CIDR block`);
  }

  const octets = match.slice(1, 5).map(Number);
  if (octets.some((o) => o > 255)) {
    throw new AddressFormatError(`"${cidr}" has an octet above 255`);
  }

  const prefixLength = Number(match[5]);
  if (prefixLength > 32) {
    throw new AddressFormatError(`"${cidr}" has a prefix length above 32`);
  }

  const network = octets.reduce((acc, o) => acc * 256 + o, 0);
  if (network % blockSize(prefixLength) !== 0) {
    throw new AddressFormatError(`"${cidr}" has host bits set beyond /${prefixLength}`);
  }

  return { network, prefixLength };
}

export function formatAddress(address: number): string {
  return [24, 16, 8, 0].map((shift) => Math.floor(address / 2 ** shift) % 256).join(".");
}

export function formatCidr(block: AddressBlock): string {
  return `${formatAddress(block.network)}/${block.prefixLength}`;
}

export function netmask(prefixLength: number): string {
  return formatAddress(IPV4_SPACE - blockSize(prefixLength));
}

export function overlaps(a: AddressBlock, b: AddressBlock): boolean {
  return a.network <= lastAddress(b) && b.network <= lastAddress(a);
}

export function contains(outer: AddressBlock, inner: AddressBlock): boolean {
  return (
    outer.prefixLength <= inner.prefixLength &&
    inner.network >= outer.network &&
    lastAddress(inner) <= lastAddress(outer)
  );
}

export function splitZones(root: AddressBlock, zoneCount: number): AddressBlock[] {
  const extraBits = Math.log2(zoneCount);
  if (!Number.isInteger(extraBits) || extraBits < 0) {
    throw new AddressFormatError(`Zone count ${zoneCount} is not a power of two`);
  }

  const zonePrefix = root.prefixLength + extraBits;
  if (zonePrefix > 32) {
    throw new AddressFormatError(`${formatCidr(root)} cannot be split into ${zoneCount} zones`);
  }

  const size = blockSize(zonePrefix);
  return Array.from({ length: zoneCount }, (_, i) => ({
    network: root.network + i * size,
    prefixLength: zonePrefix,
  }));
}

type RoleLayout = {
  offsets: { role: RoleSpec; offset: number }[];
  siteSize: number;
};

function layoutRoles(roles: readonly RoleSpec[]): RoleLayout {
  const seen = new Set<string>();
  const offsets: RoleLayout["offsets"] = [];
  let cursor = 0;

  for (const role of roles) {
    if (seen.has(role.role)) {
      throw new AddressFormatError(`Role "${role.role}" appears twice in the role table`);
    }
    seen.add(role.role);

    const size = blockSize(role.prefixLength);
    const offset = Math.ceil(cursor / size) * size;
    offsets.push({ role, offset });
    cursor = offset + size;
  }

  let siteSize = 1;
  while (siteSize < cursor) siteSize *= 2;

  return { offsets, siteSize };
}

export function planSite(opts: {
  zoneBlock: AddressBlock;
  zoneIndex: number;
  ordinal: number;
  roles: readonly RoleSpec[];
}): SitePlan {
  const { zoneBlock, zoneIndex, ordinal, roles } = opts;
  if (!Number.isInteger(ordinal) || ordinal < 0) {
    throw new AddressFormatError(`Site ordinal ${ordinal} must be a non-negative integer`);
  }
  if (roles.length === 0) {
    throw new AddressFormatError("Role table is empty");
  }

  const { offsets, siteSize } = layoutRoles(roles);
  const zoneSize = blockSize(zoneBlock.prefixLength);

  if ((ordinal + 1) * siteSize > zoneSize) {
    throw new AllocationExhaustedError(formatCidr(zoneBlock), ordinal, siteSize);
  }

  const siteNetwork = zoneBlock.network + ordinal * siteSize;
  const siteBlock: AddressBlock = {
    network: siteNetwork,
    prefixLength: 32 - Math.log2(siteSize),
  };

  return {
    zoneIndex,
    ordinal,
    zoneBlock,
    siteBlock,
    subnets: offsets.map(({ role, offset }) => ({
      role: role.role,
      block: { network: siteNetwork + offset, prefixLength: role.prefixLength },
      vlanId: role.vlanId,
    })),
  };
}

export function planOrganizationSite(
  plan: Pick<OrganizationPlan, "rootBlock" | "zoneCount" | "roles">,
  zoneIndex: number,
  ordinal: number,
): SitePlan {
  const zones = splitZones(parseCidr(plan.rootBlock), plan.zoneCount);
  const zoneBlock = zones[zoneIndex];
  if (!zoneBlock) {
    throw new AddressFormatError(`Zone index ${zoneIndex} is outside 0..${plan.zoneCount - 1}`);
  }
  return planSite({ zoneBlock, zoneIndex, ordinal, roles: plan.roles });
}

function gatewayFor(block: AddressBlock): number {
  return block.prefixLength >= 31 ? block.network : block.network + 1;
}

export function toSiteAllocation(
  siteId: string,
  orgId: string,
  plan: SitePlan,
  allocatedAt: string,
): SiteAllocation {
  return {
    siteId,
    orgId,
    zoneIndex: plan.zoneIndex,
    ordinal: plan.ordinal,
    zoneBlock: formatCidr(plan.zoneBlock),
    siteBlock: formatCidr(plan.siteBlock),
    subnets: plan.subnets.map((s) => ({
      role: s.role,
      cidr: formatCidr(s.block),
      gateway: formatAddress(gatewayFor(s.block)),
      netmask: netmask(s.block.prefixLength),
      vlanId: s.vlanId,
    })),
    allocatedAt,
  };
}

/**
 * Throws when any subnet of `candidate` intersects a subnet persisted for a
 * different site. Never resolves the overlap itself.
 */
export function assertNoConflict(candidate: SiteAllocation, existing: readonly SiteAllocation[]): void {
  for (const other of existing) {
    if (other.siteId === candidate.siteId) continue;

    for (const mine of candidate.subnets) {
      const mineBlock = parseCidr(mine.cidr);
      for (const theirs of other.subnets) {
        if (overlaps(mineBlock, parseCidr(theirs.cidr))) {
          throw new AllocationConflictError(candidate.siteId, mine.cidr, other.siteId, theirs.cidr);
        }
      }
    }
  }
}

export function deriveSiteVariables(allocation: SiteAllocation): Record<string, VariableValue> {
  const vars: Record<string, VariableValue> = {
    site_block: allocation.siteBlock,
  };
  for (const subnet of allocation.subnets) {
    vars[`${subnet.role}_subnet`] = subnet.cidr;
    vars[`${subnet.role}_gateway`] = subnet.gateway;
    vars[`${subnet.role}_netmask`] = subnet.netmask;
    vars[`${subnet.role}_vlan`] = subnet.vlanId;
  }
  return vars;
}
