import { describe, it } from "mocha"
import { expect } from "chai"
import { Vector } from "./Vector"

describe("Vector", () => {
    it("appends and removes at the back", () => {
        const vector = new Vector<number>()
        vector.pushBack(1)
        vector.pushBack(2)
        expect(vector.back()).to.equal(2)
        expect(vector.size()).to.equal(2)
        vector.popBack()
        expect(vector.back()).to.equal(1)
        expect(vector.at(0)).to.equal(1)
        expect(vector.at(-1)).to.equal(1)
    })

    it("does nothing when popping an empty vector", () => {
        const vector = new Vector<number>()
        vector.popBack()
        expect(vector.empty()).to.equal(true)
        expect(vector.back()).to.equal(undefined)
    })

    it("throws a RangeError when growing past maxSize", () => {
        const vector = new Vector<number>({ maxSize: 1 })
        vector.pushBack(1)
        expect(() => vector.pushBack(2)).to.throw(RangeError, "Vector: cannot grow past maxSize 1")
        expect(vector.toArray()).to.deep.equal([1])
    })

    it("iterates front to back", () => {
        expect([...Vector.from(["x", "y", "z"])]).to.deep.equal(["x", "y", "z"])
    })

    it("compares with the configured element functions", () => {
        const options = {
            equals: (a: string, b: string) => a.toLowerCase() === b.toLowerCase(),
            compare: (a: string, b: string) => a.length - b.length,
        }
        const a = Vector.from(["Ab", "c"], options)
        const b = Vector.from(["aB", "C"], options)
        const c = Vector.from(["aB", "cc"], options)
        expect(a.equals(b)).to.equal(true)
        expect(a.compare(c)).to.equal(-1)
        expect(c.compare(a)).to.equal(1)
    })

    it("swaps contents", () => {
        const a = Vector.from([1, 2])
        const b = Vector.from([3])
        a.swap(b)
        expect(a.toArray()).to.deep.equal([3])
        expect(b.toArray()).to.deep.equal([1, 2])
    })

    it("clones independently", () => {
        const a = Vector.from([1, 2])
        const copy = a.clone()
        copy.pushBack(3)
        expect(a.toArray()).to.deep.equal([1, 2])
        expect(copy.toArray()).to.deep.equal([1, 2, 3])
    })

    it("releases its contents and stays usable", () => {
        const a = Vector.from([1, 2])
        const moved = a.release()
        expect(moved.toArray()).to.deep.equal([1, 2])
        expect(a.empty()).to.equal(true)
        a.pushBack(9)
        expect(a.toArray()).to.deep.equal([9])
        expect(moved.size()).to.equal(2)
    })

    it("validates", () => {
        expect(Vector.from([1, 2, 3]).validate()).to.equal(true)
    })
})
