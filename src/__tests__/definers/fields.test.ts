import {
  delegate,
  ignored,
  postGenerated,
  required,
  use,
} from "../../definers/fields";
import { defineFactory } from "../../definers/defineFactory";
import { FactoryRegistry } from "../../models/FactoryRegistry";
import { factoryNotRegisteredError, validationError } from "../../errors";
import { symbolIgnored, symbolRequired } from "../../types/symbols";

describe("field descriptors", () => {
  describe("required() / ignored()", () => {
    it("creates frozen, branded markers", () => {
      const req = required();
      const ign = ignored();

      expect(req.kind).toBe("required");
      expect(req[symbolRequired]).toBe(true);
      expect(ign.kind).toBe("ignored");
      expect(ign[symbolIgnored]).toBe(true);
      expect(Object.isFrozen(req)).toBe(true);
      expect(Object.isFrozen(ign)).toBe(true);
    });
  });

  describe("use()", () => {
    it("invokes the callable with positional and named arguments", () => {
      const add = use((a: number, { b }: { b: number }) => a + b, 2, { b: 3 });
      expect(add.resolve()).toBe(5);
    });

    it("stores the callable and args without invoking it", () => {
      const fn = jest.fn((a: string, b: number) => `${a}:${b}`);
      const field = use(fn, "x", 1);

      expect(fn).not.toHaveBeenCalled();
      expect(field.kind).toBe("computed");
      expect(field.fn).toBe(fn);
      expect(field.args).toEqual(["x", 1]);
    });

    it("does not memoize: each resolve calls the callable again", () => {
      let counter = 0;
      const next = use(() => ++counter);

      expect(next.resolve()).toBe(1);
      expect(next.resolve()).toBe(2);
    });

    it("propagates errors thrown by the callable unchanged", () => {
      const boom = new Error("boom");
      const field = use(() => {
        throw boom;
      });

      expect(() => field.resolve()).toThrow(boom);
    });

    it("is immune to later mutation of the caller's argument array", () => {
      const args: [number, number] = [1, 2];
      const field = use((a: number, b: number) => a * b, ...args);
      args[0] = 10;

      expect(field.resolve()).toBe(2);
      expect(Object.isFrozen(field.args)).toBe(true);
    });
  });

  describe("postGenerated()", () => {
    it("receives the field name and resolved values", () => {
      const double = postGenerated((_name, values) => Number(values.x) * 2);
      expect(double.resolve("y", { x: 10 })).toBe(20);
    });

    it("passes fixed args after name and values", () => {
      const fn = jest.fn(
        (name: string, values: Readonly<Record<string, unknown>>, sep: string) =>
          `${name}${sep}${String(values.a)}`,
      );
      const field = postGenerated(fn, "=");

      expect(field.resolve("label", { a: 1 })).toBe("label=1");
      expect(fn).toHaveBeenCalledWith("label", { a: 1 }, "=");
      expect(field.args).toEqual(["="]);
      expect(field.kind).toBe("postResolved");
    });
  });

  describe("delegate()", () => {
    const makeRegistry = () => {
      const registry = new FactoryRegistry();
      let seq = 0;
      const pets = defineFactory({
        id: "pets",
        fields: { id: use(() => ++seq), name: "Rex" },
        registry,
        register: true,
      });
      return { registry, pets };
    };

    it("builds one object through the registered factory", () => {
      const { registry, pets } = makeRegistry();
      const build = jest.spyOn(pets, "build");
      const field = delegate("pets", { overrides: { name: "Fido" } });

      expect(field.resolve(registry)).toEqual({ id: 1, name: "Fido" });
      expect(build).toHaveBeenCalledTimes(1);
      expect(build).toHaveBeenCalledWith({ name: "Fido" });
    });

    it("uses batch when a size is given", () => {
      const { registry, pets } = makeRegistry();
      const batch = jest.spyOn(pets, "batch");
      const field = delegate(pets, { size: 5 });

      const result = field.resolve(registry);

      expect(batch).toHaveBeenCalledTimes(1);
      expect(batch).toHaveBeenCalledWith(5, {});
      expect(result).toEqual([
        { id: 1, name: "Rex" },
        { id: 2, name: "Rex" },
        { id: 3, name: "Rex" },
        { id: 4, name: "Rex" },
        { id: 5, name: "Rex" },
      ]);
    });

    it("re-runs the delegated build on every resolve", () => {
      const { registry } = makeRegistry();
      const field = delegate("pets");

      expect(field.resolve(registry)).toEqual({ id: 1, name: "Rex" });
      expect(field.resolve(registry)).toEqual({ id: 2, name: "Rex" });
    });

    it("throws a parameter error for an unregistered target", () => {
      const field = delegate("ghosts");
      let caught: unknown;

      try {
        field.resolve(new FactoryRegistry());
      } catch (err) {
        caught = err;
      }

      expect(factoryNotRegisteredError.is(caught)).toBe(true);
      expect(caught).toBeInstanceOf(Error);
      if (caught instanceof Error) {
        expect(caught.message).toContain(
          'Factory "ghosts" has not been registered. A factory must be registered before fields can delegate to it.',
        );
      }
    });

    it("resolves against the registry at call time, not at declaration", () => {
      const registry = new FactoryRegistry();
      const field = delegate("late");

      expect(() => field.resolve(registry)).toThrow(/has not been registered/);

      defineFactory({
        id: "late",
        fields: { ok: true },
        registry,
        register: true,
      });

      expect(field.resolve(registry)).toEqual({ ok: true });
    });

    it("falls back to the global registry", () => {
      defineFactory({ id: "global.pet", fields: { kind: "cat" }, register: true });
      expect(delegate("global.pet").resolve()).toEqual({ kind: "cat" });
    });

    it.each([0, -1, 2.5])("rejects size %p at declaration", (size) => {
      let caught: unknown;
      try {
        delegate("pets", { size });
      } catch (err) {
        caught = err;
      }
      expect(validationError.is(caught)).toBe(true);
    });

    it("keeps configuration frozen", () => {
      const overrides = { name: "A" };
      const field = delegate("pets", { size: 2, overrides });
      overrides.name = "B";

      expect(field.overrides).toEqual({ name: "A" });
      expect(field.size).toBe(2);
      expect(field.target).toBe("pets");
      expect(Object.isFrozen(field)).toBe(true);
    });
  });
});
