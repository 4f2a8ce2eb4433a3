import { test } from "node:test";
import assert from "node:assert/strict";
import { languageSchema, translate } from "../src/services/i18n.js";

test("translate fills placeholders", () => {
  assert.equal(translate("en", "received", { n: 3 }), "Received 3 file(s).");
  assert.equal(translate("ar", "received", { n: 3 }), "تم استلام 3 ملف(ات).");
});

test("translate leaves unknown placeholders as written", () => {
  assert.equal(translate("en", "archived"), "Session archived and reset ({batch}).");
});

test("translate falls back to the key for unknown messages", () => {
  assert.equal(translate("ar", "no_such_message"), "no_such_message");
});

test("languageSchema accepts only supported languages", () => {
  assert.equal(languageSchema.safeParse("ar").success, true);
  assert.equal(languageSchema.safeParse("fr").success, false);
});
