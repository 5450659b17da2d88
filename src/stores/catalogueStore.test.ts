import { Catalogue, buildCatalogue } from "../domain/catalogue";
import { CatalogueUnavailableError, MalformedCatalogueError } from "../domain/errors";
import { CatalogueStore } from "./catalogueStore";

describe("CatalogueStore", () => {
  const first = buildCatalogue({ CS100: [{ section: "001" }] });
  const second = buildCatalogue({ CS100: [{ section: "001" }], CS200: [{ section: "001" }] });

  const sequence = (...steps: Array<Catalogue | Error>) => {
    let index = 0;
    return jest.fn(() => {
      const step = steps[Math.min(index, steps.length - 1)];
      index += 1;
      if (step instanceof Error) throw step;
      return step;
    });
  };

  afterEach(() => {
    jest.useRealTimers();
  });

  it("is unavailable until the first load", () => {
    const store = new CatalogueStore(sequence(first));

    expect(store.isLoaded()).toBe(false);
    expect(store.stats()).toBeNull();
    expect(() => store.current()).toThrow(CatalogueUnavailableError);
  });

  it("swaps in a new snapshot on reload", () => {
    const store = new CatalogueStore(sequence(first, second));

    store.reload();
    const held = store.current();
    store.reload();

    expect(held).toBe(first);
    expect(store.current()).toBe(second);
    expect(held.courseIds()).toEqual(["CS100"]);
  });

  it("keeps the previous snapshot when a reload fails", () => {
    const failure = new MalformedCatalogueError(["bad data"]);
    const store = new CatalogueStore(sequence(first, failure));

    store.reload();
    expect(() => store.reload()).toThrow(failure);

    expect(store.current()).toBe(first);
    expect(store.getLastError()).toBe(failure);
  });

  it("carries the load error as the cause when nothing loaded", () => {
    const failure = new MalformedCatalogueError(["bad data"]);
    const store = new CatalogueStore(sequence(failure));

    expect(() => store.reload()).toThrow(failure);

    let caught: unknown;
    try {
      store.current();
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CatalogueUnavailableError);
    if (caught instanceof CatalogueUnavailableError) {
      expect(caught.cause).toBe(failure);
    }
  });

  it("reloads on an interval until stopped", () => {
    jest.useFakeTimers();
    const source = sequence(first, second);
    const store = new CatalogueStore(source);
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);

    store.startAutoReload(5);
    jest.advanceTimersByTime(5 * 60 * 1000);

    expect(source).toHaveBeenCalledTimes(1);
    expect(store.current()).toBe(first);
    expect(log).toHaveBeenCalledWith("Catalogue reloaded: 1 courses, 1 sections");

    store.stopAutoReload();
    jest.advanceTimersByTime(10 * 60 * 1000);
    expect(source).toHaveBeenCalledTimes(1);

    log.mockRestore();
  });

  it("logs failed interval reloads and keeps serving", () => {
    jest.useFakeTimers();
    const store = new CatalogueStore(sequence(first, new Error("disk gone")));
    const errorLog = jest.spyOn(console, "error").mockImplementation(() => undefined);
    const log = jest.spyOn(console, "log").mockImplementation(() => undefined);

    store.reload();
    store.startAutoReload(1);
    jest.advanceTimersByTime(60 * 1000);

    expect(store.current()).toBe(first);
    expect(errorLog).toHaveBeenCalledTimes(1);

    store.stopAutoReload();
    errorLog.mockRestore();
    log.mockRestore();
  });
});
