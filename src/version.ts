declare const __STS_AUTOREFRESH_VERSION__: string;

export function getSDKVersion(): string {
  return typeof __STS_AUTOREFRESH_VERSION__ !== "undefined"
    ? __STS_AUTOREFRESH_VERSION__
    : "0.0.0";
}

/** Default user agent sent by clients created with this package. */
export function defaultUserAgent(): string {
  return `sts-autorefresh/${getSDKVersion()} node/${process.versions.node}`;
}
