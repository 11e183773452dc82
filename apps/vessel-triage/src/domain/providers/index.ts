/**
 * @fileoverview Providers barrel exports
 *
 * @module domain/providers
 */

export {
    DEFAULT_INBOX_EXTENSIONS,
    InboxDirectoryProvider,
    type InboxProviderConfig,
} from "./InboxDirectoryProvider.js";
