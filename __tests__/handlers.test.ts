import { getCharts, getPreview, getSummary, uploadDataset, type UploadedFile } from "@/lib/handlers"
import { getDatasetStore, InMemoryDatasetStore } from "@/lib/store"
import { DEFAULT_CONFIG } from "@/lib/config"

const UUID_RE = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/
const FIXED_ID = "6f1c1f0e-8a7b-4c3d-9e2f-0123456789ab"

const csvFile = (text: string, type = "text/csv"): UploadedFile => ({
  name: "orders.csv",
  type,
  bytes: new TextEncoder().encode(text),
})

const ORDERS = [
  "ordered_on,region,amount",
  "2024-01-01,North,10",
  "2024-01-01,North,12",
  "2024-01-02,South,",
].join("\n")

describe("uploadDataset", () => {
  let store: InMemoryDatasetStore

  beforeEach(() => {
    store = new InMemoryDatasetStore()
    jest.spyOn(console, "log").mockImplementation(() => {})
    jest.spyOn(console, "warn").mockImplementation(() => {})
  })

  afterEach(() => {
    jest.restoreAllMocks()
  })

  it("analyzes the file and stores the bundle under a fresh id", () => {
    const result = uploadDataset(store, csvFile(ORDERS))
    expect(result.ok).toBe(true)
    expect(result.status).toBe(200)
    if (!result.ok) return

    expect(result.body.dataset_id).toMatch(UUID_RE)
    expect(store.size()).toBe(1)

    const bundle = store.get(result.body.dataset_id)
    expect(bundle?.filename).toBe("orders.csv")
    expect(bundle?.types).toEqual({ ordered_on: "date", region: "category", amount: "number" })
    expect(Object.isFrozen(bundle)).toBe(true)
  })

  it("accepts a content type with parameters", () => {
    expect(uploadDataset(store, csvFile(ORDERS, "text/csv; charset=utf-8")).status).toBe(200)
  })

  it("rejects unsupported content types", () => {
    const result = uploadDataset(store, csvFile(ORDERS, "application/json"))
    expect(result).toEqual({
      ok: false,
      status: 400,
      body: { error: "Unsupported file type. Please upload a CSV file." },
    })
    expect(store.size()).toBe(0)
  })

  it("rejects empty files", () => {
    expect(uploadDataset(store, csvFile("")).body).toEqual({ error: "Uploaded file is empty." })
  })

  it("rejects files over the configured limit", () => {
    const config = { ...DEFAULT_CONFIG, maxUploadBytes: 10 }
    const result = uploadDataset(store, csvFile(ORDERS), { config })
    expect(result.status).toBe(413)
    expect(result.body).toEqual({ error: "File too large. Maximum allowed size is 10 B." })
  })

  it("rejects files that are not valid CSV", () => {
    const result = uploadDataset(store, csvFile("a,b\n1,2,3\n"))
    expect(result.status).toBe(400)
    expect(result.body).toEqual({ error: "Failed to parse CSV file." })
  })

  it("rejects bytes that are not UTF-8", () => {
    const file: UploadedFile = { name: "bin.csv", type: "text/csv", bytes: new Uint8Array([0x61, 0xff, 0xfe, 0x0a]) }
    expect(uploadDataset(store, file).body).toEqual({ error: "Failed to parse CSV file." })
  })
})

describe("dataset reads", () => {
  const store = new InMemoryDatasetStore()

  beforeAll(() => {
    jest.spyOn(console, "log").mockImplementation(() => {})
    uploadDataset(store, csvFile(ORDERS), { newId: () => FIXED_ID })
  })

  afterAll(() => {
    jest.restoreAllMocks()
  })

  it("returns the stored summary", () => {
    const result = getSummary(store, FIXED_ID)
    expect(result).toEqual({
      ok: true,
      status: 200,
      body: {
        row_count: 3,
        column_count: 3,
        latest_date: "2024-01-02T00:00:00",
        top_category: { column: "region", value: "North", ratio: 2 / 3 },
        missing_columns: ["amount"],
      },
    })
  })

  it("returns the stored charts", () => {
    const result = getCharts(store, FIXED_ID)
    expect(result.ok).toBe(true)
    if (!result.ok) return
    expect(result.body.by_category_top5?.data).toEqual([
      { label: "North", value: 2 },
      { label: "South", value: 1 },
    ])
    expect(result.body.by_date?.data).toEqual([
      { date: "2024-01-01", count: 2 },
      { date: "2024-01-02", count: 1 },
    ])
  })

  it("returns the stored preview", () => {
    const result = getPreview(store, FIXED_ID)
    expect(result.body).toEqual({
      columns: [
        { name: "ordered_on", type: "date" },
        { name: "region", type: "category" },
        { name: "amount", type: "number" },
      ],
      rows: [
        ["2024-01-01", "North", "10"],
        ["2024-01-01", "North", "12"],
        ["2024-01-02", "South", ""],
      ],
    })
  })

  it("matches ids regardless of case", () => {
    expect(getSummary(store, FIXED_ID.toUpperCase()).status).toBe(200)
  })

  it("answers 422 for malformed ids", () => {
    expect(getCharts(store, "not-a-uuid")).toEqual({ ok: false, status: 422, body: { error: "Invalid dataset id." } })
  })

  it("answers 404 for unknown ids", () => {
    expect(getPreview(store, "00000000-0000-4000-8000-000000000000")).toEqual({
      ok: false,
      status: 404,
      body: { error: "Dataset not found." },
    })
  })
})

describe("getDatasetStore", () => {
  it("returns the same process-wide store", () => {
    expect(getDatasetStore()).toBe(getDatasetStore())
  })
})
