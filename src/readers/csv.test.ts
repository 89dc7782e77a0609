import { CsvReader } from './csv';

describe('CsvReader', () => {
    const reader = new CsvReader();

    describe('readInputs', () => {
        it('should take the price column', async () => {
            const content = `name,price
Coffee,$3.50
Tea,
Cake,"€4,20"`;

            const inputs = await reader.readInputs({ content });

            expect(inputs).toEqual(['$3.50', '€4,20']);
        });

        it('should use a custom column and delimiter', async () => {
            const content = `item;amount
Rent;1.234,56 EUR
Lunch;  £12  `;

            const inputs = await reader.readInputs({ content, column: 'amount', delimiter: ';' });

            expect(inputs).toEqual(['1.234,56 EUR', '£12']);
        });

        it('should fail when the column is missing', async () => {
            await expect(reader.readInputs({ content: 'name,cost\nCoffee,3' })).rejects.toThrow(
                "Column 'price' not found in CSV header"
            );
        });

        it('should fail without content or file', async () => {
            await expect(reader.readInputs({})).rejects.toThrow('CsvReader needs either content or a file');
        });

        it('should return nothing for a header-only file', async () => {
            expect(await reader.readInputs({ content: 'name,price' })).toEqual([]);
        });
    });
});
