// Property-Based Tests for the Form Gate

import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { FormGate, SUBMIT_LABEL_INCOMPLETE, SUBMIT_LABEL_READY, validateForm } from "./form-gate.js";
import type { AttachedFile, CandidateFormValues } from "./types.js";

const LIMIT = 1000;

const arbFile: fc.Arbitrary<AttachedFile | null> = fc.option(
  fc.record({
    name: fc.string({ minLength: 1, maxLength: 12 }),
    size: fc.integer({ min: 0, max: LIMIT * 2 }),
  }).map(({ name, size }) => ({ name, size, content: new Blob([]) })),
  { nil: null },
);

const arbText = fc.oneof(fc.constant(""), fc.constant("   "), fc.string({ maxLength: 20 }));
const arbEmail = fc.oneof(arbText, fc.emailAddress());

const arbForm: fc.Arbitrary<CandidateFormValues> = fc.record({
  name: arbText,
  position: arbText,
  email: arbEmail,
  jobDescription: arbFile,
  resume: arbFile,
});

describe("Form Gate properties", () => {
  it("valid exactly when every rule holds, and the hint follows validity", () => {
    fc.assert(
      fc.property(arbForm, (values) => {
        const result = validateForm(values, LIMIT);
        const expected =
          values.name.trim() !== "" &&
          values.position.trim() !== "" &&
          /^[^\s@]+@[^\s@]+\.[^\s@]+$/.test(values.email.trim()) &&
          values.jobDescription !== null &&
          values.jobDescription.size <= LIMIT &&
          values.resume !== null &&
          values.resume.size <= LIMIT;

        expect(result.valid).toBe(expected);
        expect(result.submitDisabled).toBe(!expected);
        expect(result.submitLabel).toBe(expected ? SUBMIT_LABEL_READY : SUBMIT_LABEL_INCOMPLETE);
        expect(result.errors.length === 0).toBe(expected);
      }),
    );
  });

  it("never holds an attachment above the ceiling", () => {
    fc.assert(
      fc.property(fc.array(fc.tuple(fc.constantFrom("jobDescription" as const, "resume" as const), arbFile)), (steps) => {
        const gate = new FormGate({ debounceMs: 300, maxFileSizeBytes: LIMIT, onValidation: vi.fn() });
        for (const [field, file] of steps) {
          const accepted = gate.attach(field, file);
          expect(accepted).toBe(file === null || file.size <= LIMIT);
          const held = gate.snapshot[field];
          expect(held === null || held.size <= LIMIT).toBe(true);
        }
        gate.reset();
      }),
    );
  });
});
