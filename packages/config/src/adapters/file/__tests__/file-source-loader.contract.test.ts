import fs from "node:fs/promises"
import os from "node:os"
import path from "node:path"
import { describeSourceLoaderContract } from "../../../ports/__tests__/source-loader.contract"
import { FileSourceLoader } from "../file-source-loader"

describeSourceLoaderContract({
  name: "FileSourceLoader",
  make: async (sources) => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "flagini-file-"))

    for (const [name, content] of Object.entries(sources)) {
      await fs.writeFile(path.join(dir, name), content)
    }

    return {
      loader: new FileSourceLoader(),
      idFor: (name) => path.join(dir, name),
      cleanup: () => fs.rm(dir, { recursive: true, force: true }),
    }
  },
})
