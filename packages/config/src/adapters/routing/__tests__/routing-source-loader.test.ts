import { createNullLogger } from "@flagini/logger"
import { mock } from "vitest-mock-extended"
import type { SourceLoader } from "../../../ports/source-loader"
import { RoutingSourceLoader } from "../routing-source-loader"

describe("RoutingSourceLoader", () => {
  it("sends remote identifiers to http and the rest to file", async () => {
    const file = mock<SourceLoader>()
    const http = mock<SourceLoader>()
    file.load.mockResolvedValue(new Uint8Array([1]))
    http.load.mockResolvedValue(new Uint8Array([2]))

    const loader = new RoutingSourceLoader({ logger: createNullLogger(), file, http })
    const options = { allowUnsecure: true }

    expect(await loader.load("conf/app.ini", options)).toEqual(new Uint8Array([1]))
    expect(await loader.load("HTTPS://config.test/app.ini", options)).toEqual(new Uint8Array([2]))

    expect(file.load).toHaveBeenCalledWith("conf/app.ini", options)
    expect(http.load).toHaveBeenCalledWith("HTTPS://config.test/app.ini", options)
  })
})
