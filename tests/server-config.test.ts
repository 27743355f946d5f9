import { describe, it, expect } from "vitest";
import { ServerConfig } from "../src/client/config/serverConfig";

const label = (text: string) => `\x1B[96m\x1B[1m${text}\x1B[0m`;
const value = (text: string) => `\x1B[37m${text}\x1B[0m`;

describe("ServerConfig", () => {
  describe("Url", () => {
    it("should clear the URL for an invalid string", () => {
      const srv = new ServerConfig();
      srv.setUrl("asdf");
      expect(srv.url).toBe("");
    });

    it("should clear a previously valid URL when given an invalid one", () => {
      const srv = new ServerConfig();
      srv.setUrl("http://banana:8080");
      srv.setUrl("not-a-url");
      expect(srv.url).toBe("");
    });

    it("should store a valid URL", () => {
      const srv = new ServerConfig();
      srv.setUrl("http://banana:8080");
      expect(srv.url).toBe("http://banana:8080");
    });

    it("should normalize a trailing slash", () => {
      const withSlash = new ServerConfig();
      withSlash.setUrl("http://banana:8080/");
      const withoutSlash = new ServerConfig();
      withoutSlash.setUrl("http://banana:8080");

      expect(withSlash.url).toBe("http://banana:8080");
      expect(withSlash.url).toBe(withoutSlash.url);
    });
  });

  describe("Fields", () => {
    it("should default version to 1.0", () => {
      expect(new ServerConfig().version).toBe("1.0");
    });

    it("should keep the last API key", () => {
      const srv = new ServerConfig();
      expect(srv.apiKey).toBe("");

      srv.setApiKey("my_api_key");
      expect(srv.apiKey).toBe("my_api_key");

      srv.setApiKey("my_other_api_key");
      expect(srv.apiKey).toBe("my_other_api_key");
    });

    it("should store local name verbatim", () => {
      const srv = new ServerConfig();
      srv.setLocalName(" local_name ");
      expect(srv.localName).toBe(" local_name ");
    });

    it("should reset every field on clear", () => {
      const srv = new ServerConfig();
      srv.setUrl("http://serverurl.com");
      srv.setVersion("2.0");
      srv.setApiKey("ABCD");
      srv.setLocalName("local_name");

      srv.clear();

      expect(srv.url).toBe("");
      expect(srv.version).toBe("1.0");
      expect(srv.apiKey).toBe("");
      expect(srv.localName).toBe("");
    });

    it("should clone into an independent copy", () => {
      const srv = new ServerConfig();
      srv.setUrl("http://serverurl.com");
      srv.setApiKey("ABCD");

      const copy = srv.clone();
      copy.setApiKey("EFGH");

      expect(copy.url).toBe("http://serverurl.com");
      expect(copy.apiKey).toBe("EFGH");
      expect(srv.apiKey).toBe("ABCD");
    });
  });

  describe("AsString", () => {
    it("should print empty fields for a default server", () => {
      expect(new ServerConfig().asString()).toBe(
        "URL: \nVersion: 1.0\nAPI key: \n"
      );
    });

    it("should print URL, version and API key but not local name", () => {
      const srv = new ServerConfig();
      srv.setUrl("http://serverurl.com");
      srv.setVersion("2.0");
      srv.setApiKey("ABCD");
      srv.setLocalName("local_name");

      expect(srv.asString()).toBe(
        "URL: http://serverurl.com\nVersion: 2.0\nAPI key: ABCD\n"
      );
    });
  });

  describe("AsPrettyString", () => {
    it("should only print the version for a default server", () => {
      expect(new ServerConfig().asPrettyString()).toBe(
        "\x1B[96m\x1B[1mVersion: \x1B[0m\x1B[37m1.0\x1B[0m\n"
      );
    });

    it("should print every non-empty field in color", () => {
      const srv = new ServerConfig();
      srv.setUrl("http://serverurl.com");
      srv.setVersion("2.0");
      srv.setApiKey("ABCD");
      srv.setLocalName("local_name");

      const str = srv.asPrettyString();
      expect(str).toBe(
        `${label("URL: ")}${value("http://serverurl.com")}\n` +
          `${label("Version: ")}${value("2.0")}\n` +
          `${label("API key: ")}${value("ABCD")}\n`
      );
      expect(str.includes("local_name")).toBe(false);
    });

    it("should omit the API key line when only the URL is set", () => {
      const srv = new ServerConfig();
      srv.setUrl("http://serverurl.com");

      expect(srv.asPrettyString()).toBe(
        `${label("URL: ")}${value("http://serverurl.com")}\n` +
          `${label("Version: ")}${value("1.0")}\n`
      );
    });
  });
});
