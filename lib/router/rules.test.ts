import assert from "node:assert/strict";
import test from "node:test";
import { classifyByRules, findCaseNumber, isCaseNumber, readDocumentNumber, wantsFullText } from "@/lib/router/rules";

test("a case-number token forces legal-only and is extracted verbatim", () => {
  assert.deepEqual(classifyByRules("show me case 123/456/78"), {
    intent: "general",
    hasCaseNumber: true,
    useRetrieval: false,
    useLegal: true,
  });
  assert.equal(findCaseNumber("show me case 123/456/78"), "123/456/78");
});

test("hasCaseNumber follows the digits/digits/digits grammar only", () => {
  assert.equal(classifyByRules("справа 12/34").hasCaseNumber, false);
  assert.equal(classifyByRules("справа 910/1234/21 у касації").hasCaseNumber, true);
  assert.equal(findCaseNumber("без номера"), null);
  assert.equal(isCaseNumber("123/456/78"), true);
  assert.equal(isCaseNumber("справа 123/456/78"), false);
});

test("empty query enables both sources with no special intent", () => {
  assert.deepEqual(classifyByRules("   "), {
    useRetrieval: true,
    useLegal: true,
    intent: "general",
    hasCaseNumber: false,
  });
});

test("a case number outranks document phrasing, including the user's own documents", () => {
  const generic = classifyByRules("документ по справі 123/456/78");
  assert.equal(generic.useLegal, true);
  assert.equal(generic.useRetrieval, false);

  const mineWithCase = classifyByRules("чи згадується 123/456/78 у моїх документах?");
  assert.equal(mineWithCase.useLegal, true);
  assert.equal(mineWithCase.useRetrieval, false);

  const mine = classifyByRules("що сказано в моїх документах про оренду");
  assert.equal(mine.intent, "general");
  assert.equal(mine.useLegal, false);
  assert.equal(mine.useRetrieval, true);
});

test("legal terms add retrieval only when document terms are present", () => {
  assert.deepEqual(
    [classifyByRules("що таке позовна давність").useRetrieval, classifyByRules("що таке позовна давність").useLegal],
    [false, true],
  );
  assert.equal(classifyByRules("чи відповідає договір вимогам закону").useRetrieval, true);
  assert.deepEqual(
    [classifyByRules("яка погода").useRetrieval, classifyByRules("яка погода").useLegal],
    [true, true],
  );
});

test("special intents are detected from phrasing", () => {
  assert.equal(classifyByRules("скільки документів я завантажив?").intent, "list_documents");
  assert.equal(classifyByRules("видали всі документи").intent, "delete_all");
  assert.equal(classifyByRules("видали оренда.pdf").intent, "delete_one");
  assert.equal(classifyByRules("дай повний текст рішення у справі 123/456/78").intent, "full_text");
  assert.equal(classifyByRules("в якому документі вказана сума оренди?").intent, "document_sweep");
  assert.equal(classifyByRules("повний текст закону про оренду").intent, "general");
});

test("document numbers scope sweeps and deletions", () => {
  assert.equal(readDocumentNumber("що сказано в документі 2?"), 2);
  assert.equal(readDocumentNumber("delete document #3"), 3);
  assert.equal(readDocumentNumber("документ 123/456/78"), undefined);

  const scoped = classifyByRules("що сказано в документі 2?");
  assert.equal(scoped.intent, "document_sweep");
  assert.equal(scoped.documentNumber, 2);
  assert.equal(classifyByRules("видали документ 2").intent, "delete_one");
  assert.equal(wantsFullText("Full text please"), true);
});
