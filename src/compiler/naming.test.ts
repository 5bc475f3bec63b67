import { describe, it, expect } from "vitest"
import { candidateNames, enumConstantName, md5, toPascalCase } from "@/compiler/naming"

describe("toPascalCase", () => {
  it.each([
    ["spec", "Spec"],
    ["apiVersion", "ApiVersion"],
    ["tls-config", "TlsConfig"],
    ["tls_config", "TlsConfig"],
    ["URLs", "URLs"],
    ["a.b c", "ABC"],
    ["x509", "X509"],
    ["--", ""],
  ])("should convert %j to %j", (input, expected) => {
    expect(toPascalCase(input)).toBe(expected)
  })
})

describe("enumConstantName", () => {
  it("should append the PascalCased literal", () => {
    expect(enumConstantName("Phase", "running")).toBe("PhaseRunning")
    expect(enumConstantName("Phase", "not-ready")).toBe("PhaseNotReady")
  })

  it("should give the wildcard and the empty string reserved suffixes", () => {
    expect(enumConstantName("Scope", "*")).toBe("ScopeAll")
    expect(enumConstantName("Scope", "")).toBe("ScopeEmptyValue")
  })

  it("should strip embedded double quotes", () => {
    expect(enumConstantName("Quote", '"a"')).toBe("QuoteA")
  })

  it("should stringify non-string literals", () => {
    expect(enumConstantName("Level", 3)).toBe("Level3")
    expect(enumConstantName("Flag", true)).toBe("FlagTrue")
    expect(enumConstantName("Value", null)).toBe("ValueNull")
  })
})

describe("candidateNames", () => {
  const take = (candidates: Iterable<string>, count: number) => {
    const taken: string[] = []
    for (const candidate of candidates) {
      if (taken.length === count) break
      taken.push(candidate)
    }
    return taken
  }

  it("should try the bare name, the kind, every path prefix and then a digest", () => {
    const candidates = take(candidateNames({ kind: "TestCase", fieldName: "Foo", path: "TestCase.Status.Bar", topLevel: false }), 6)

    expect(candidates).toEqual([
      "Foo",
      "TestCaseFoo",
      "BarFoo",
      "StatusBarFoo",
      "TestCaseStatusBarFoo",
      "Foo_f8559662a4db3e0bf226e9df87cdcfb1",
    ])
  })

  it("should not offer the bare name for fields of the root struct", () => {
    const candidates = take(candidateNames({ kind: "Widget", fieldName: "Spec", path: "Widget", topLevel: true }), 5)

    expect(candidates[0]).toBe("WidgetSpec")
    expect(candidates).not.toContain("Spec")
  })

  it("should PascalCase raw path segments", () => {
    const candidates = take(candidateNames({ kind: "Widget", fieldName: "Foo", path: "Widget.spec", topLevel: false }), 5)

    expect(candidates).toEqual(["Foo", "WidgetFoo", "SpecFoo", "WidgetSpecFoo", "Foo_5de013dbbb33108c29a41643d40736cb"])
  })

  it("should digest the raw property key rather than the field name", () => {
    const camel = take(candidateNames({ kind: "Widget", fieldName: "FooBar", sourceKey: "fooBar", path: "Widget.spec", topLevel: false }), 5)
    const snake = take(candidateNames({ kind: "Widget", fieldName: "FooBar", sourceKey: "foo_bar", path: "Widget.spec", topLevel: false }), 5)

    expect(camel[4]).toBe(`FooBar_${md5("Widget.spec.fooBar")}`)
    expect(snake[4]).toBe(`FooBar_${md5("Widget.spec.foo_bar")}`)
    expect(camel[4]).not.toBe(snake[4])
  })

  it("should continue with numbered digest names", () => {
    const candidates = take(candidateNames({ kind: "Widget", fieldName: "FooBar", sourceKey: "fooBar", path: "Widget.spec", topLevel: false }), 7)

    expect(candidates.slice(4)).toEqual([
      "FooBar_c67a196a2babbef098179bb301ad89d6",
      "FooBar_c67a196a2babbef098179bb301ad89d6_2",
      "FooBar_c67a196a2babbef098179bb301ad89d6_3",
    ])
  })
})
