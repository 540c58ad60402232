/** Version of the plugin SDK this host serves; compared with a manifest's minSdkVersion. */
export const SDK_VERSION = '0.1.0';
