import { z } from "zod";

// GitHub logins: alphanumerics and single hyphens, at most 39 chars.
export const Login = z
  .string()
  .min(1)
  .max(39)
  .regex(/^[A-Za-z0-9](?:[A-Za-z0-9]|-(?=[A-Za-z0-9]))*$/, "Invalid GitHub login");

export const RepoName = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[A-Za-z0-9._-]+$/, "Invalid repository name")
  .refine((n) => n !== "." && n !== "..", "Invalid repository name");
