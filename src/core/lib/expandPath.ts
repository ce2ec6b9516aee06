import type { Host } from "@services/HostService";

const HOME_PREFIX = /^~(?=$|[\\/])/;
const POSIX_VARIABLE = /\$(\w+)|\$\{([^}]+)\}/g;
const WINDOWS_VARIABLE = /%([^%]+)%/g;

/**
 * Expand `~`, `$VAR` and `${VAR}` (plus `%VAR%` on Windows) against the host.
 * Variables the host does not define are left as written.
 */
export const expandPath = (raw: string, host: Host): string => {
  const withHome = raw.replace(HOME_PREFIX, () => host.homeDir);

  const withPosixVars = withHome.replace(
    POSIX_VARIABLE,
    (match: string, bare: string | undefined, braced: string | undefined) => {
      const name = bare ?? braced;
      return (name !== undefined ? host.env[name] : undefined) ?? match;
    }
  );

  if (host.platform !== "win32") return withPosixVars;

  return withPosixVars.replace(
    WINDOWS_VARIABLE,
    (match: string, name: string) => host.env[name] ?? match
  );
};
