import { describe, it, expect } from "vitest"
import { compileBatch } from "@/compiler/compiler"
import { makeCrd, object, string } from "@/tests/helpers"
import { collectTypeDependencies, collectTypeReferences, findTypeOwner, indexBatchTypes, structDependencies, subsetBatch } from "@/model/dependencies"

const batch = compileBatch([
  makeCrd("Widget", object({ spec: object({ shared: object({ x: string() }), phase: string({ enum: ["On", "Off"] }) }) })),
  makeCrd("Gadget", object({ spec: object({ shared: object({ x: string() }), size: { type: "integer" } }) })),
  makeCrd("Thing", object({ spec: object({ z: string() }) })),
])
const [widget, gadget, thing] = batch.resources

describe("collectTypeReferences", () => {
  it("should collect named types nested in collections", () => {
    const refs = collectTypeReferences({
      kind: "map",
      values: { kind: "array", items: { kind: "optional", inner: { kind: "named", name: "Foo", target: "struct" } } },
    })

    expect(refs).toEqual(new Set(["Foo"]))
  })
})

describe("structDependencies", () => {
  it("should list the types a struct's fields refer to", () => {
    const spec = widget?.structs.get("WidgetSpec")

    expect(spec && structDependencies(spec)).toEqual(new Set(["Phase", "Shared"]))
  })
})

describe("indexBatchTypes", () => {
  it("should index roots, lists, structs and enums by name", () => {
    const index = indexBatchTypes(batch)

    expect(index.get("Widget")?.kind).toBe("root")
    expect(index.get("GadgetList")?.kind).toBe("list")
    expect(index.get("Shared")?.kind).toBe("struct")
    expect(index.get("Phase")?.kind).toBe("enum")
    expect(index.size).toBe(11)
  })

  it("should find the resource that defines a type", () => {
    expect(findTypeOwner(batch, "Shared")).toBe(widget)
    expect(findTypeOwner(batch, "GadgetSpec")).toBe(gadget)
    expect(findTypeOwner(batch, "Nope")).toBeUndefined()
  })
})

describe("collectTypeDependencies", () => {
  it("should follow references across resources", () => {
    expect(collectTypeDependencies(["GadgetSpec"], batch)).toEqual(["GadgetSpec", "Shared"])
  })

  it("should pull in the list type of a root kind", () => {
    expect(collectTypeDependencies(["Widget"], batch)).toEqual(["Widget", "WidgetList", "WidgetSpec", "Phase", "Shared"])
  })

  it("should pull in the root kind of a list type", () => {
    expect(collectTypeDependencies(["ThingList"], batch)).toEqual(["ThingList", "Thing", "ThingSpec"])
  })

  it("should skip names the batch does not define", () => {
    expect(collectTypeDependencies(["Nope", "Phase"], batch)).toEqual(["Phase"])
  })
})

describe("subsetBatch", () => {
  it("should keep only the resources owning the requested types and their dependencies", () => {
    const subset = subsetBatch(batch, ["GadgetSpec"])

    expect(subset.resources.map((model) => model.descriptor.kind)).toEqual(["Widget", "Gadget"])
    expect([...(subset.resources[0]?.structs.keys() ?? [])].sort()).toEqual(["Shared", "WidgetSpec"])
    expect([...(subset.resources[1]?.structs.keys() ?? [])]).toEqual(["GadgetSpec"])
  })

  it("should drop unrelated resources", () => {
    const subset = subsetBatch(batch, ["ThingSpec"])

    expect(subset.resources).toHaveLength(1)
    expect(subset.resources[0]?.root).toBe(thing?.root)
    expect(subset.group).toBe("example.com")
  })
})
