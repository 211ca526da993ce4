// src/tests/api.test.ts
import request from "supertest";
import { createApp } from "../app";
import { CLASS_CSV, COLUMNS, SECTION_RANGES, classSheet } from "./fixtures";

const silence = () => {
  jest.spyOn(console, "log").mockImplementation(() => undefined);
  jest.spyOn(console, "warn").mockImplementation(() => undefined);
};

describe("🌐 Result Analyzer API", () => {
  beforeAll(silence);
  afterAll(() => jest.restoreAllMocks());

  describe("infrastructure", () => {
    const app = createApp();

    it("reports health", async () => {
      const res = await request(app).get("/health");
      expect(res.status).toBe(200);
      expect(res.body.status).toBe("OK");
      expect(res.body.datasets).toBe(0);
      expect(res.body.cache).toEqual({ size: 0, capacity: 32, hits: 0, misses: 0 });
    });

    it("answers unknown routes with 404", async () => {
      const res = await request(app).get("/nope");
      expect(res.status).toBe(404);
      expect(res.body).toEqual({ message: "Route /nope not found", method: "GET" });
    });

    it("strips operator keys from the body", async () => {
      const res = await request(app)
        .post("/datasets")
        .send({ name: { $gt: "" }, rows: [{ USN: "1" }] });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({ success: false, message: "name is required" });
    });
  });

  describe("uploads", () => {
    const app = createApp();

    it("imports a CSV mark sheet", async () => {
      const res = await request(app)
        .post("/datasets/upload")
        .field("name", "Sem 5")
        .field("branch", "cse")
        .attach("file", Buffer.from(CLASS_CSV), "marks.csv");

      expect(res.status).toBe(201);
      expect(res.body.name).toBe("Sem 5");
      expect(res.body.branch).toBe("CSE");
      expect(res.body.students).toBe(3);
      expect(res.body.columns).toBe(11);
      expect(res.body.subjects).toEqual(["CS301", "CS302"]);
      expect(res.body.warnings).toEqual([]);
    });

    it("names the dataset after the file by default", async () => {
      const res = await request(app).post("/datasets/upload").attach("file", Buffer.from(CLASS_CSV), "sem6.csv");
      expect(res.status).toBe(201);
      expect(res.body.name).toBe("sem6.csv");
      expect(res.body.branch).toBeUndefined();
    });

    it("rejects other file types", async () => {
      const res = await request(app).post("/datasets/upload").attach("file", Buffer.from("hello"), "notes.txt");
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Only CSV and Excel files allowed");
    });

    it("requires a file", async () => {
      const res = await request(app).post("/datasets/upload").field("name", "Empty");
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("No file uploaded");
    });

    it("lists stored datasets", async () => {
      const res = await request(app).get("/datasets");
      expect(res.status).toBe(200);
      expect(res.body.map((d: { name: string }) => d.name)).toEqual(["Sem 5", "sem6.csv"]);
    });
  });

  describe("analysis", () => {
    const app = createApp();
    let id = "";

    beforeAll(async () => {
      const res = await request(app)
        .post("/datasets")
        .send({ name: "Sem 5 / CSE", columns: COLUMNS, rows: classSheet().rows });
      id = res.body.id;
    });

    it("classifies and ranks the class", async () => {
      const res = await request(app)
        .post(`/datasets/${id}/analysis`)
        .send({ sections: { ranges: SECTION_RANGES } });

      expect(res.status).toBe(200);
      expect(res.body.subjects).toEqual(["CS301", "CS302"]);
      expect(res.body.records.map((r: { class_rank?: number }) => r.class_rank ?? null)).toEqual([
        1, 3, null, null, null, 1,
      ]);
      expect(res.body.kpis.passPercentage).toBe(50);
      expect(res.body.report.toppers.map((t: { name: string }) => t.name)).toEqual(["Asha", "Farid"]);
    });

    it("serves repeat requests from the cache", async () => {
      await request(app).post(`/datasets/${id}/analysis`).send({ credits: { CS301: 4, CS302: 3 } });
      await request(app).post(`/datasets/${id}/analysis`).send({ credits: { CS302: 3, CS301: 4 } });
      const health = await request(app).get("/health");
      expect(health.body.cache.hits).toBeGreaterThanOrEqual(1);
    });

    it("rejects invalid options with every problem listed", async () => {
      const res = await request(app).post(`/datasets/${id}/analysis`).send({ mode: "cgpa" });
      expect(res.status).toBe(400);
      expect(res.body).toEqual({
        success: false,
        message: "Invalid analysis options",
        details: ["mode must be one of marks, sgpa"],
      });
    });

    it("filters the ranking list", async () => {
      const pass = await request(app).post(`/datasets/${id}/ranking`).send({ filter: "pass" });
      expect(pass.body.students.map((s: { student_id: string }) => s.student_id)).toEqual([
        "1XY22CS001",
        "1XY22CS006",
        "1XY22CS002",
      ]);

      const fail = await request(app).post(`/datasets/${id}/ranking`).send({ filter: "FAIL" });
      expect(fail.body.students.map((s: { student_id: string }) => s.student_id)).toEqual([
        "1XY22CS004",
        "1XY22CS003",
        "1XY22CS005",
      ]);
    });

    it("rejects an unknown ranking filter", async () => {
      const res = await request(app).post(`/datasets/${id}/ranking`).send({ filter: "TOP" });
      expect(res.status).toBe(400);
      expect(res.body.details).toEqual(["filter must be one of ALL, PASS, FAIL"]);
    });

    it("reports subject statistics", async () => {
      const res = await request(app).post(`/datasets/${id}/subjects`).send({});
      expect(res.status).toBe(200);
      expect(res.body[1]).toEqual({
        code: "CS302",
        appeared: 6,
        passed: 5,
        failed: 0,
        absent: 1,
        passPercentage: 83.33,
        average: 52,
        highest: 68,
        lowest: 12,
      });
    });

    it("finds one student regardless of case", async () => {
      const res = await request(app).post(`/datasets/${id}/students/1xy22cs004`).send({});
      expect(res.status).toBe(200);
      expect(res.body.name).toBe("Dev");
      expect(res.body.failed_subject_names).toEqual(["CS301"]);
      expect(res.body.subject_status).toEqual({ CS301: "Fail", CS302: "Pass" });
    });

    it("returns 404 for an unknown student", async () => {
      const res = await request(app).post(`/datasets/${id}/students/1XY22CS999`).send({});
      expect(res.status).toBe(404);
      expect(res.body.message).toBe("Student 1XY22CS999 not found");
    });

    it("exports the category workbook", async () => {
      const res = await request(app).post(`/datasets/${id}/export`).send({});
      expect(res.status).toBe(200);
      expect(res.headers["content-type"]).toContain("spreadsheetml.sheet");
      expect(res.headers["content-disposition"]).toBe('attachment; filename="Results_Sem_5_CSE.xlsx"');
    });

    it("deletes a dataset", async () => {
      const removed = await request(app).delete(`/datasets/${id}`);
      expect(removed.status).toBe(200);

      const res = await request(app).get(`/datasets/${id}`);
      expect(res.status).toBe(404);
      expect(res.body.message).toBe(`Dataset ${id} not found`);
    });
  });

  describe("JSON datasets", () => {
    const app = createApp();

    it("takes column order from the rows when none is given", async () => {
      const res = await request(app)
        .post("/datasets")
        .send({ name: "Lab", rows: [{ Roll: "R1", "CS301 Internal": 20, "CS301 Total": 60 }, { Roll: "R2", Section: "B" }] });
      expect(res.status).toBe(201);
      expect(res.body.columns).toBe(4);
      expect(res.body.subjects).toEqual(["CS301"]);
    });

    it("rejects rows with nested values", async () => {
      const res = await request(app)
        .post("/datasets")
        .send({ name: "Bad", rows: [{ USN: "1", marks: { total: 5 } }] });
      expect(res.status).toBe(400);
      expect(res.body.message).toBe("Row 1: marks must be a plain value");
    });
  });

  describe("branch comparison", () => {
    const app = createApp();

    beforeAll(async () => {
      const sheet = classSheet();
      await request(app).post("/datasets").send({ name: "CSE", branch: "cse", columns: COLUMNS, rows: sheet.rows });
      await request(app)
        .post("/datasets")
        .send({ name: "ECE", branch: "ECE", columns: COLUMNS, rows: sheet.rows.slice(0, 2) });
      await request(app).post("/datasets").send({ name: "Untagged", columns: COLUMNS, rows: sheet.rows });
    });

    it("compares every branch-tagged dataset", async () => {
      const res = await request(app).post("/branches/compare").send({});
      expect(res.status).toBe(200);
      expect(res.body.totalStudents).toBe(8);
      expect(res.body.bestBranch).toBe("ECE");
      expect(res.body.weakBranch).toBe("CSE");
      expect(res.body.hardestSubject).toBe("CS301");
    });

    it("narrows by branch name", async () => {
      const res = await request(app).post("/branches/compare").send({ branches: ["cse"] });
      expect(res.body.totalBranches).toBe(1);
      expect(res.body.bestBranch).toBe("N/A");
    });

    it("validates the request body", async () => {
      const res = await request(app).post("/branches/compare").send({ datasetIds: "all" });
      expect(res.status).toBe(400);
      expect(res.body.details).toEqual(["datasetIds must be an array of strings"]);
    });

    it("returns 404 when no dataset matches", async () => {
      const res = await request(app).post("/branches/compare").send({ branches: ["MECH"] });
      expect(res.status).toBe(404);
      expect(res.body.message).toBe("No branch datasets to compare");
    });
  });
});
