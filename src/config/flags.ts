// Environment flags for genpassword
// CLI options override these; these override the config file

function truthy(env: NodeJS.ProcessEnv, key: string) {
  const value = env[key]?.toLowerCase();
  return value === 'true' || value === '1';
}

export function computeFlags(env: NodeJS.ProcessEnv = process.env) {
  return {
    // Explicit config file path (must exist when set)
    GENPASSWORD_CONFIG: env['GENPASSWORD_CONFIG'],
    GENPASSWORD_LOG_LEVEL: env['GENPASSWORD_LOG_LEVEL']?.toLowerCase(),
    // Never touch the clipboard
    GENPASSWORD_NO_COPY: truthy(env, 'GENPASSWORD_NO_COPY'),

    XDG_CONFIG_HOME: env['XDG_CONFIG_HOME'],
    HOME: env['HOME'] ?? env['USERPROFILE'],
  };
}

export type Flags = ReturnType<typeof computeFlags>;
