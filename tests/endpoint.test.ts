import { describe, expect, it } from "vitest"
import { EndpointRecord, detectProtocol, parseDescriptor } from "../src/proxy/endpoint.js"
import { base64 } from "./helpers/feed.js"

describe("parseDescriptor", () => {
  it("never throws on an unknown scheme and falls back to placeholders", () => {
    for (const raw of ["not a config", "", "http://example.com:8080", "vless:/broken", "\u0000\u0001"]) {
      const parsed = parseDescriptor(raw)
      expect(parsed.protocol).toBe("unknown")
      expect(parsed.name).toBe("Unnamed")
    }
    expect(parseDescriptor("not a config")).toEqual({ protocol: "unknown", name: "Unnamed", address: "unknown", port: 443 })
  })

  it("detects the scheme case-insensitively", () => {
    expect(detectProtocol("VLESS://u@h:1#x")).toBe("vless")
    expect(detectProtocol("Trojan://p@h:1")).toBe("trojan")
    expect(detectProtocol("ss://abc")).toBe("ss")
    expect(detectProtocol("ssr://abc")).toBe("ssr")
    expect(detectProtocol("socks5://h:1")).toBe("unknown")
  })

  it("reads name, host and port from a userinfo descriptor", () => {
    expect(parseDescriptor("vless://user@host:443#NodeA")).toEqual({ protocol: "vless", name: "NodeA", address: "host", port: 443 })
    expect(parseDescriptor("trojan://pw@example.org:8443?sni=x#%E8%8A%82%E7%82%B9")).toEqual({
      protocol: "trojan",
      name: "节点",
      address: "example.org",
      port: 8443
    })
  })

  it("ignores '@' inside the path or query", () => {
    expect(parseDescriptor("vless://uuid@real.host:8443?type=ws&path=/ws@edge#N")).toMatchObject({ address: "real.host", port: 8443 })
    expect(parseDescriptor("trojan://pw@real.host:2053/ws@edge#N")).toMatchObject({ address: "real.host", port: 2053 })
    expect(parseDescriptor("ss://YWVz/Ln@ss.example:8388#S")).toMatchObject({ address: "ss.example", port: 8388 })
  })

  it("falls back to port 443 on a missing or out-of-range port", () => {
    expect(parseDescriptor("trojan://pw@host.example:99999#X").port).toBe(443)
    expect(parseDescriptor("trojan://pw@host.example#X").port).toBe(443)
  })

  it("reads bracketed IPv6 hosts", () => {
    const parsed = parseDescriptor("vless://u@[2001:db8::1]:8443#V6")
    expect(parsed.address).toBe("2001:db8::1")
    expect(parsed.port).toBe(8443)
  })

  it("uses remark/remarks when there is no fragment, base64 or plain", () => {
    expect(parseDescriptor(`vless://u@h.example:2053?remarks=${base64("香港01")}`).name).toBe("香港01")
    expect(parseDescriptor("vless://u@h.example:2053?remark=Tokyo%20A").name).toBe("Tokyo A")
    expect(parseDescriptor(`vless://u@h.example:2053?remarks=${base64("ignored")}#Fragment`).name).toBe("Fragment")
  })

  it("decodes vmess JSON payloads", () => {
    const payload = base64(JSON.stringify({ v: "2", ps: "JP-1", add: "jp.example.net", port: "10086", id: "x" }))
    expect(parseDescriptor(`vmess://${payload}`)).toEqual({ protocol: "vmess", name: "JP-1", address: "jp.example.net", port: 10086 })
  })

  it("decodes base64 userinfo of ss descriptors", () => {
    const parsed = parseDescriptor(`ss://${base64("aes-256-gcm:test-secret@ss.example.com:8388")}#SS`)
    expect(parsed).toEqual({ protocol: "ss", name: "SS", address: "ss.example.com", port: 8388 })
  })

  it("decodes ssr payloads with base64 remarks", () => {
    const inner = `ssr.example.com:443:auth_aes128_md5:aes-256-cfb:tls1.2_ticket_auth:${base64("test-secret")}/?remarks=${base64("SSR-1")}`
    expect(parseDescriptor(`ssr://${base64(inner)}`)).toEqual({ protocol: "ssr", name: "SSR-1", address: "ssr.example.com", port: 443 })
  })

  it("never reports an address it cannot read", () => {
    expect(parseDescriptor("vless://u@bad host!:443#N").address).toBe("unknown")
  })
})

describe("EndpointRecord", () => {
  it("starts untested", () => {
    const rec = new EndpointRecord("vless://user@host:443#NodeA")
    expect(rec.lastLatency).toBe(-1)
    expect(rec.tested).toBe(false)
    expect(rec.successRate).toBeNull()
  })

  it("records successes and failures", () => {
    const rec = new EndpointRecord("vless://user@host:443#NodeA")
    rec.recordTest({ success: true, latencyMs: 120.4 }, 1000)
    expect(rec.lastLatency).toBe(120)
    expect(rec.successCount).toBe(1)
    expect(rec.lastTestTime).toBe(1000)

    rec.recordTest({ success: false, latencyMs: -1 }, 1010)
    expect(rec.lastLatency).toBe(-1)
    expect(rec.failureCount).toBe(1)
    expect(rec.testCount).toBe(2)
    expect(rec.successRate).toBe(0.5)
    expect(rec.lastTestTime).toBe(1010)
  })

  it("keeps statistics across toRecord/fromRecord and re-derives parsed fields", () => {
    const rec = new EndpointRecord("trojan://pw@example.org:8443#T")
    rec.recordTest({ success: true, latencyMs: 80 }, 5)
    rec.tags = ["fast"]
    const data = { ...rec.toRecord(), name: "stale", port: 1 }
    const back = EndpointRecord.fromRecord(data)
    expect(back.name).toBe("T")
    expect(back.port).toBe(8443)
    expect(back.lastLatency).toBe(80)
    expect(back.successCount).toBe(1)
    expect(back.tags).toEqual(["fast"])
  })

  it("builds the address key from protocol, host and port", () => {
    expect(new EndpointRecord("vless://a@h.example:1#x").addressKey).toBe("vless|h.example|1")
  })
})
