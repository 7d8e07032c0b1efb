import { z } from "zod";

import { Roles, TOP_LEVEL_ROLES } from "./types.js";

const SpecVersionSchema = z
  .string()
  .refine((value) => /^\d+\.\d+(\.\d+)?$/.test(value), {
    message: "spec_version must be numeric MAJOR.MINOR[.PATCH]",
  })
  .refine((value) => value.split(".")[0] === "1", {
    message: "unsupported spec_version major version (expected 1)",
  });

const VersionSchema = z.number().int().positive().refine(Number.isSafeInteger, {
  message: "version must be a safe integer",
});

const ExpiresSchema = z.string().refine((value) => !Number.isNaN(Date.parse(value)), {
  message: "expires must be an ISO-8601 timestamp",
});

const HashesSchema = z.record(z.string(), z.string());

const KeySchema = z
  .object({
    keytype: z.string(),
    scheme: z.string(),
    keyval: z.object({ public: z.string() }).passthrough(),
  })
  .passthrough();

const RoleSchema = z.object({
  keyids: z.array(z.string()).min(1),
  threshold: z.number().int().positive(),
});

const MetaFileSchema = z.object({
  version: VersionSchema,
  length: z.number().int().nonnegative().optional(),
  hashes: HashesSchema.optional(),
});

const TargetFileSchema = z.object({
  length: z.number().int().nonnegative().optional(),
  hashes: HashesSchema,
  custom: z.record(z.string(), z.unknown()).optional(),
});

const common = {
  spec_version: SpecVersionSchema,
  version: VersionSchema,
  expires: ExpiresSchema,
};

const RootSignedSchema = z.object({
  _type: z.literal(Roles.Root),
  ...common,
  consistent_snapshot: z.boolean().optional(),
  keys: z.record(z.string(), KeySchema),
  roles: z
    .object({
      [Roles.Root]: RoleSchema,
      [Roles.Timestamp]: RoleSchema,
      [Roles.Snapshot]: RoleSchema,
      [Roles.Targets]: RoleSchema,
    })
    .strict(),
});

const TimestampSignedSchema = z.object({
  _type: z.literal(Roles.Timestamp),
  ...common,
  meta: z.object({ "snapshot.json": MetaFileSchema }),
});

const SnapshotSignedSchema = z.object({
  _type: z.literal(Roles.Snapshot),
  ...common,
  meta: z.object({ "targets.json": MetaFileSchema }).catchall(MetaFileSchema),
});

const TargetsSignedSchema = z.object({
  _type: z.literal(Roles.Targets),
  ...common,
  targets: z.record(z.string(), TargetFileSchema),
});

export const SignedSchema = z
  .discriminatedUnion("_type", [
    RootSignedSchema,
    TimestampSignedSchema,
    SnapshotSignedSchema,
    TargetsSignedSchema,
  ])
  .superRefine((signed, ctx) => {
    if (signed._type !== Roles.Root) {
      return;
    }
    for (const role of TOP_LEVEL_ROLES) {
      for (const keyid of signed.roles[role].keyids) {
        if (!(keyid in signed.keys)) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            path: ["roles", role, "keyids"],
            message: `keyid ${keyid} is not listed in keys`,
          });
        }
      }
    }
  });

const SignatureSchema = z.object({
  keyid: z.string(),
  sig: z.string(),
});

export const MetafileSchema = z.object({
  signed: SignedSchema,
  signatures: z.array(SignatureSchema),
});

export type Key = z.infer<typeof KeySchema>;
export type MetaFile = z.infer<typeof MetaFileSchema>;
export type TargetFileInfo = z.infer<typeof TargetFileSchema>;
export type Signature = z.infer<typeof SignatureSchema>;
export type RootSigned = z.infer<typeof RootSignedSchema>;
export type TimestampSigned = z.infer<typeof TimestampSignedSchema>;
export type SnapshotSigned = z.infer<typeof SnapshotSignedSchema>;
export type TargetsSigned = z.infer<typeof TargetsSignedSchema>;
export type Signed = z.infer<typeof SignedSchema>;
