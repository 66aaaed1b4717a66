import { IndiError } from "@indi-manager/indi";

export class ProfileNotFoundError extends IndiError {
  constructor(name: string) {
    super("PROFILE_NOT_FOUND", `Profile not found: ${name}`, { name });
    this.name = "ProfileNotFoundError";
  }
}
