import { describe, expect, it } from "vitest";

import {
  DOTTED_VERSION_COMPARATOR,
  checkModuleVersions,
  parseVcsSource,
  scanModuleVersions,
  type ModulePin,
} from "./versions.js";

const MODULES = `module "vpc" {
  source  = "app.terraform.io/acme/vpc/aws"
  version = "2.3.1"
}

module "dns" {
  source  = "app.terraform.io/acme/dns/aws"
  version = "~> 1.4.0"
}

module "legacy" {
  source = "git::https://github.com/acme/terraform-aws-legacy?ref=v0.9.0"
}

module "bucket" {
  source  = "app.terraform.io/acme/bucket/aws"
  version = ">= 1.0, < 2.0"
}

module "local" {
  source = "./modules/local"
}
`;

function pin(label: string, version: string | null): ModulePin {
  const source = `app.terraform.io/acme/${label}/aws`;
  return { label, name: label, source, version, constraint: version };
}

describe("scanModuleVersions", () => {
  it("collects registry and git pins, skipping local modules", () => {
    expect(scanModuleVersions(MODULES)).toEqual([
      {
        label: "vpc",
        name: "vpc",
        source: "app.terraform.io/acme/vpc/aws",
        version: "2.3.1",
        constraint: "2.3.1",
      },
      {
        label: "dns",
        name: "dns",
        source: "app.terraform.io/acme/dns/aws",
        version: "1.4.0",
        constraint: "~> 1.4.0",
      },
      {
        label: "legacy",
        name: "terraform-aws-legacy",
        source: "git::https://github.com/acme/terraform-aws-legacy?ref=v0.9.0",
        version: "0.9.0",
        constraint: null,
      },
      {
        label: "bucket",
        name: "bucket",
        source: "app.terraform.io/acme/bucket/aws",
        version: null,
        constraint: ">= 1.0, < 2.0",
      },
    ]);
  });
});

describe("parseVcsSource", () => {
  it("reads the repository name and version ref", () => {
    const source = "git::https://github.com/acme/terraform-aws-dns//zone?ref=v1.4.0";
    expect(parseVcsSource(source)).toEqual({ name: "terraform-aws-dns", version: "1.4.0" });
    expect(parseVcsSource("git::https://github.com/acme/net.git?ref=main")).toEqual({
      name: "net",
      version: null,
    });
    expect(parseVcsSource("./modules/net")).toBeNull();
  });
});

describe("checkModuleVersions", () => {
  it("reports modules outside their bounds, matching by label or name", () => {
    const violations = checkModuleVersions(scanModuleVersions(MODULES), {
      vpc: { min: "3.0.0" },
      dns: { max: "1.3" },
      "terraform-aws-legacy": { min: "0.9" },
      bucket: { min: "1.0.0" },
    });

    expect(violations.map((violation) => violation.message)).toEqual([
      'module "vpc" version 2.3.1 is below minimum required 3.0.0',
      'module "dns" version 1.4.0 exceeds maximum allowed 1.3',
      'module "bucket" is constrained to ">= 1.0, < 2.0" but requires at least 1.0.0',
    ]);
  });

  it("accepts unpinned modules when only a maximum is required", () => {
    expect(checkModuleVersions([pin("vpc", null)], { vpc: { max: "2.0.0" } })).toEqual([]);
  });

  it("rejects pre-releases when they are not allowed", () => {
    const violations = checkModuleVersions(
      [pin("vpc", "2.0.0-rc.1")],
      { vpc: { min: "1.0.0" } },
      DOTTED_VERSION_COMPARATOR,
      { allowPrerelease: false },
    );

    expect(violations).toEqual([
      {
        module: "vpc",
        version: "2.0.0-rc.1",
        message: 'module "vpc" uses pre-release version 2.0.0-rc.1',
      },
    ]);
  });

  it("reports unparseable versions instead of throwing", () => {
    const violations = checkModuleVersions([pin("vpc", "1.0.0")], { vpc: { min: "abc" } });

    expect(violations[0]?.message).toBe(
      'module "vpc" has an invalid version: Invalid version format: abc',
    );
  });

  it("uses a custom comparator when given one", () => {
    const reversed = {
      compare: (a: string, b: string) => DOTTED_VERSION_COMPARATOR.compare(b, a),
      isPrerelease: () => false,
    };

    expect(checkModuleVersions([pin("vpc", "1.0.0")], { vpc: { min: "2.0.0" } }, reversed)).toEqual(
      [],
    );
  });
});

describe("DOTTED_VERSION_COMPARATOR", () => {
  const { compare, isPrerelease } = DOTTED_VERSION_COMPARATOR;

  it("compares dotted releases numerically with missing parts as zero", () => {
    expect(compare("1.2", "1.2.0")).toBe(0);
    expect(compare("1.10.0", "1.9.9")).toBe(1);
    expect(compare("v2.0.0", "2.0.1")).toBe(-1);
  });

  it("orders pre-releases before their release", () => {
    expect(compare("1.0.0-rc.1", "1.0.0")).toBe(-1);
    expect(compare("1.0.0-alpha", "1.0.0-alpha.1")).toBe(-1);
    expect(compare("1.0.0-alpha.2", "1.0.0-alpha.10")).toBe(-1);
    expect(compare("1.0.0-beta", "1.0.0-alpha")).toBe(1);
    expect(isPrerelease("2.0.0-rc.1")).toBe(true);
    expect(isPrerelease("2.0.0")).toBe(false);
  });

  it("throws on versions it cannot parse", () => {
    expect(() => compare("latest", "1.0.0")).toThrow("Invalid version format: latest");
  });
});
