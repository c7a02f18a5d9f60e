import type { FlagHandle, MemoryFlagRegistry } from "@flagini/config"

export type DemoFlags = {
  addr: FlagHandle<string>
  workers: FlagHandle<number>
  ratio: FlagHandle<number>
  verbose: FlagHandle<boolean>
  greeting: FlagHandle<string>
  apiKey: FlagHandle<string>
}

export function defineFlags(registry: MemoryFlagRegistry): DemoFlags {
  return {
    addr: registry.string("addr", ":8080", "TCP address to listen on"),
    workers: registry.integer("workers", 4, "Number of worker loops"),
    ratio: registry.number("ratio", 0.5, "Share of traffic sent to the new backend"),
    verbose: registry.boolean("verbose", false, "Log every request"),
    greeting: registry.string("greeting", "hello", "Greeting text, may span lines"),
    apiKey: registry.string("apiKey", "", "Upstream API key"),
  }
}
