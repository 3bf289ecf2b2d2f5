/**
 * zapwatch
 *
 * Publishes NIP-57 zap receipts for paid Core Lightning invoices.
 */

// Core schemas and types
export * from "./core/Schema.js"
export * from "./core/Errors.js"
export * from "./core/Config.js"
export { decodeNsec, encodeNpub, encodeNsec, parseSecretKey } from "./core/Nip19.js"

// Services
export * from "./services/CryptoService.js"
export * from "./services/EventService.js"
export * from "./services/SigningKey.js"

// Relays
export * from "./client/RelayService.js"
export * from "./client/RelayPublisher.js"

// Lightning node
export * from "./lightning/Invoice.js"
export * from "./lightning/LightningNode.js"
export * from "./lightning/ClnRpc.js"

// Zap pipeline
export * from "./zapper/ZapOutcome.js"
export * from "./zapper/ZapRequest.js"
export * from "./zapper/ZapReceipt.js"
export * from "./zapper/CursorStore.js"
export * from "./zapper/PaymentWatcher.js"
