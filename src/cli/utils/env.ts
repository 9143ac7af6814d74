/**
 * Shell export statements that point HTTP clients at the capture proxy.
 */

/**
 * Escape a string for safe use inside double-quoted shell context.
 * Within double quotes, `\`, `"`, `$`, `` ` ``, and `!` are interpreted by the shell.
 */
function escapeDoubleQuoted(str: string): string {
  return str
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\$/g, "\\$")
    .replace(/`/g, "\\`")
    .replace(/!/g, "\\!");
}

/**
 * One `export KEY="value"` line per variable.
 */
export function formatEnvVars(vars: Record<string, string>): string {
  return Object.entries(vars)
    .map(([key, value]) => `export ${key}="${escapeDoubleQuoted(value)}"`)
    .join("\n");
}

/**
 * Proxy and CA-trust variables understood by common HTTP clients.
 */
export function buildProxyEnvVars(proxyUrl: string, caCertFile: string): Record<string, string> {
  return {
    HTTP_PROXY: proxyUrl,
    HTTPS_PROXY: proxyUrl,
    // Many Unix tools only read the lowercase variants
    http_proxy: proxyUrl,
    https_proxy: proxyUrl,
    SSL_CERT_FILE: caCertFile,
    REQUESTS_CA_BUNDLE: caCertFile,
    CURL_CA_BUNDLE: caCertFile,
    NODE_EXTRA_CA_CERTS: caCertFile,
    GIT_SSL_CAINFO: caCertFile,
    AWS_CA_BUNDLE: caCertFile,
  };
}
