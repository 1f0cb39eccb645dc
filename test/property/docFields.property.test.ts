import test from "node:test";
import assert from "node:assert/strict";

import fc from "fast-check";

import { resolveDocFields } from "../../src/commands/shared/ticketRows";

const docKey = fc.constantFrom("owner", "approver", "customer", "verifier", "review_user", "change_control_number", "zone");

test("rendered doc fields are the requested keys that were observed", () => {
  fc.assert(
    fc.property(fc.array(docKey), fc.option(fc.array(docKey), { nil: undefined }), (observed, requested) => {
      const result = resolveDocFields(observed, requested, true);
      const observedSet = new Set(observed);

      assert.ok(result.fields.every((key) => observedSet.has(key)));
      assert.ok(result.missing.every((key) => !observedSet.has(key)));
      assert.equal(new Set(result.fields).size, result.fields.length);

      if (requested === undefined) {
        assert.deepEqual(result.fields, Array.from(observedSet).sort());
        assert.deepEqual(result.missing, []);
        return;
      }

      const wanted = new Set(requested);
      assert.ok(result.fields.every((key) => wanted.has(key)));
      assert.deepEqual(
        [...result.fields, ...result.missing].sort(),
        Array.from(wanted).sort()
      );
    }),
    { numRuns: 200 }
  );
});

test("excluded docs never produce columns", () => {
  fc.assert(
    fc.property(fc.array(docKey), fc.option(fc.array(docKey), { nil: undefined }), (observed, requested) => {
      assert.deepEqual(resolveDocFields(observed, requested, false), { fields: [], missing: [] });
    })
  );
});
