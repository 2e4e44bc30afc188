// Interview Session Client - Form Gate
// Validates candidate input and the two required attachments before any
// session work starts. Input errors are recovered here and never reach the
// network layer.

import { MAX_FILE_SIZE_BYTES } from "./config.js";
import { TaskScheduler } from "./scheduler.js";
import type { ScheduledTask } from "./scheduler.js";
import type {
  AttachedFile,
  AttachmentField,
  CandidateFormValues,
  FormFieldError,
  FormValidation,
  MessageSink,
  ValidatedCandidateForm,
} from "./types.js";

const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

export const SUBMIT_LABEL_READY = "Start Interview Setup";
export const SUBMIT_LABEL_INCOMPLETE = "Please complete all fields";

export function emptyForm(): CandidateFormValues {
  return { name: "", position: "", email: "", jobDescription: null, resume: null };
}

export function isValidEmail(value: string): boolean {
  return EMAIL_PATTERN.test(value.trim());
}

export function isWithinSizeLimit(file: AttachedFile, maxBytes: number = MAX_FILE_SIZE_BYTES): boolean {
  return file.size <= maxBytes;
}

export function oversizeMessage(file: AttachedFile, maxBytes: number = MAX_FILE_SIZE_BYTES): string {
  const limitMb = Math.round(maxBytes / (1024 * 1024));
  return `File "${file.name}" is too large. Maximum size is ${limitMb}MB.`;
}

/**
 * Pure validation of one snapshot of the form.
 */
export function validateForm(values: CandidateFormValues, maxFileSizeBytes: number = MAX_FILE_SIZE_BYTES): FormValidation {
  const errors: FormFieldError[] = [];

  if (values.name.trim() === "") {
    errors.push({ field: "name", message: "Name is required" });
  }
  if (values.position.trim() === "") {
    errors.push({ field: "position", message: "Position is required" });
  }
  if (values.email.trim() === "") {
    errors.push({ field: "email", message: "Email is required" });
  } else if (!isValidEmail(values.email)) {
    errors.push({ field: "email", message: "Email must look like name@domain.tld" });
  }

  const attachments: Array<[AttachmentField, string]> = [
    ["jobDescription", "Job description file is required"],
    ["resume", "Resume file is required"],
  ];
  for (const [field, missingMessage] of attachments) {
    const file = values[field];
    if (!file) {
      errors.push({ field, message: missingMessage });
    } else if (!isWithinSizeLimit(file, maxFileSizeBytes)) {
      errors.push({ field, message: oversizeMessage(file, maxFileSizeBytes) });
    }
  }

  const valid = errors.length === 0;
  return {
    valid,
    submitDisabled: !valid,
    submitLabel: valid ? SUBMIT_LABEL_READY : SUBMIT_LABEL_INCOMPLETE,
    errors,
  };
}

/**
 * Narrows a form snapshot to a ValidatedCandidateForm, or null when the
 * snapshot does not pass validation.
 */
export function toValidatedForm(values: CandidateFormValues, maxFileSizeBytes: number = MAX_FILE_SIZE_BYTES): ValidatedCandidateForm | null {
  if (!validateForm(values, maxFileSizeBytes).valid || !values.jobDescription || !values.resume) {
    return null;
  }
  return {
    name: values.name.trim(),
    position: values.position.trim(),
    email: values.email.trim(),
    jobDescription: values.jobDescription,
    resume: values.resume,
  };
}

// ─── Stateful gate with debounced revalidation ──────────────────────────────────

export interface FormGateDeps {
  debounceMs: number;
  maxFileSizeBytes?: number;
  onValidation: (validation: FormValidation) => void;
  onMessage?: MessageSink;
  scheduler?: TaskScheduler;
}

export class FormGate {
  private values: CandidateFormValues = emptyForm();
  private readonly deps: FormGateDeps;
  private readonly scheduler: TaskScheduler;
  private readonly maxFileSizeBytes: number;
  private pending: ScheduledTask | null = null;

  constructor(deps: FormGateDeps) {
    this.deps = deps;
    this.scheduler = deps.scheduler ?? new TaskScheduler();
    this.maxFileSizeBytes = deps.maxFileSizeBytes ?? MAX_FILE_SIZE_BYTES;
  }

  get snapshot(): Readonly<CandidateFormValues> {
    return this.values;
  }

  /** Applies text field edits and schedules one trailing-edge validation pass. */
  update(patch: Partial<Pick<CandidateFormValues, "name" | "position" | "email">>): void {
    this.values = { ...this.values, ...patch };
    this.scheduleValidation();
  }

  /**
   * Attaches (or clears, with null) a file. An oversized file is rejected on
   * the spot: the attachment is cleared and a message is posted.
   * @returns whether the file was accepted.
   */
  attach(field: AttachmentField, file: AttachedFile | null): boolean {
    let accepted = true;
    if (file && !isWithinSizeLimit(file, this.maxFileSizeBytes)) {
      this.deps.onMessage?.("setup", { level: "danger", text: oversizeMessage(file, this.maxFileSizeBytes) });
      file = null;
      accepted = false;
    }
    this.values = field === "resume"
      ? { ...this.values, resume: file }
      : { ...this.values, jobDescription: file };
    this.scheduleValidation();
    return accepted;
  }

  /** Cancels any pending debounced pass and validates immediately. */
  validateNow(): FormValidation {
    this.pending?.cancel();
    this.pending = null;
    const validation = validateForm(this.values, this.maxFileSizeBytes);
    this.deps.onValidation(validation);
    return validation;
  }

  validated(): ValidatedCandidateForm | null {
    return toValidatedForm(this.values, this.maxFileSizeBytes);
  }

  reset(): void {
    this.scheduler.cancelAll();
    this.pending = null;
    this.values = emptyForm();
    this.validateNow();
  }

  private scheduleValidation(): void {
    this.pending?.cancel();
    this.pending = this.scheduler.schedule("form-validation", this.deps.debounceMs, () => {
      this.pending = null;
      this.deps.onValidation(validateForm(this.values, this.maxFileSizeBytes));
    });
  }
}
