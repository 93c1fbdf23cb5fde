import { join } from "node:path";

/** Upstream repository holding the Packer template and Terraform plan. */
export const REPO_URL = "https://github.com/digitalocean/supabase-on-do.git";
export const REPO_DIR = "supabase-on-do";

export const PACKER_DIR = "packer";
export const TERRAFORM_DIR = "terraform";

/** Variable file paths, relative to REPO_DIR. */
export const PACKER_VARS_FILE = join(PACKER_DIR, "supabase.auto.pkrvars.hcl");
export const TERRAFORM_VARS_FILE = join(TERRAFORM_DIR, "terraform.tfvars");

export const REQUIRED_TOOLS = ["git", "doctl", "packer", "terraform"] as const;

/** Secrets Terraform generates while provisioning, in the order they are printed. */
export const TERRAFORM_OUTPUTS = ["htpasswd", "psql_pass", "jwt", "jwt_anon", "jwt_service_role"] as const;

/** Basic-auth user in front of Supabase Studio. */
export const STUDIO_USERNAME = "supabase";
export const STUDIO_SUBDOMAIN = "supabase";

export const DO_API = "https://api.digitalocean.com/v2";

export const DEFAULT_REGION = "nyc3";
export const DEFAULT_IMAGE = "ubuntu-22-04-x64";
export const DEFAULT_SIZE = "s-2vcpu-4gb";
export const DEFAULT_SSH_USERNAME = "root";
